/**
 * Package Identity
 *
 * Run-scoped unique identifier and modification timestamp embedded in
 * the package document and the NCX.
 */

import { randomBytes } from 'node:crypto';
import { formatUtcTimestamp } from '@docbinder/utils';
import type { PackageIdentity } from '@docbinder/core';

export type RandomSource = (size: number) => Uint8Array;

/**
 * Version 4 UUID, lowercase 8-4-4-4-12 hex
 */
export function generateUuid4(random: RandomSource = randomBytes): string {
  const bytes = Uint8Array.from(random(16));
  if (bytes.length !== 16) {
    throw new RangeError(`Random source returned ${bytes.length} bytes, expected 16`);
  }

  // version nibble = 4, variant bits = 10
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x40;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;

  const hex = Buffer.from(bytes).toString('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

export function createPackageIdentity(
  now: Date = new Date(),
  random: RandomSource = randomBytes
): PackageIdentity {
  return {
    uuid: `urn:uuid:${generateUuid4(random)}`,
    timestamp: formatUtcTimestamp(now),
  };
}
