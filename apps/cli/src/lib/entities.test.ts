import { describe, expect, it } from 'vitest';
import { ValidationError } from '@docbinder/core';
import { parseEntitiesFile } from './entities.js';

describe('parseEntitiesFile', () => {
  it('accepts a bare array', () => {
    const file = parseEntitiesFile('[{"id":"foo","title":"foo","kind":"module"}]', 'entities.json');

    expect(file).toEqual({
      entities: [{ id: 'foo', title: 'foo', kind: 'module', body: '', members: [] }],
    });
  });

  it('reads project and version from the object form', () => {
    const file = parseEntitiesFile(
      JSON.stringify({ project: 'demo', version: '1.0.0', entities: [] }),
      'entities.json'
    );

    expect(file).toEqual({ project: 'demo', version: '1.0.0', entities: [] });
  });

  it('reports malformed JSON against the file path', () => {
    expect(() => parseEntitiesFile('{not json', 'broken.json')).toThrow(ValidationError);
    expect(() => parseEntitiesFile('{not json', 'broken.json')).toThrow(/^Validation failed for broken\.json: /);
  });

  it('rejects documents without entities', () => {
    expect(() => parseEntitiesFile('{"project":"demo"}', 'entities.json')).toThrow(
      'Validation failed for entities.json: expected an array of entities or an object with an "entities" array'
    );
  });
});
