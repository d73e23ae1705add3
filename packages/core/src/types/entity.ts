/**
 * Documented Entity Types
 *
 * Entities arrive already extracted and rendered; the pipeline only
 * arranges them into pages.
 */

import { z } from 'zod';

export const ENTITY_KINDS = ['module', 'exception', 'protocol'] as const;
export const MEMBER_KINDS = ['function', 'macro', 'callback', 'type'] as const;

export type EntityKind = typeof ENTITY_KINDS[number];
export type MemberKind = typeof MEMBER_KINDS[number];

// Identifiers become file names inside the archive
const entityIdSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_.\-]+$/, 'must contain only letters, digits, ".", "_" or "-"');

export const entityMemberSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(MEMBER_KINDS),
  signature: z.string().min(1),
  body: z.string().default(''),
});

export const documentedEntitySchema = z.object({
  id: entityIdSchema,
  title: z.string().min(1),
  kind: z.enum(ENTITY_KINDS),
  body: z.string().default(''),
  summary: z.string().optional(),
  members: z.array(entityMemberSchema).default([]),
});

export const documentedEntityListSchema = z.array(documentedEntitySchema);

export type EntityMember = z.infer<typeof entityMemberSchema>;

/**
 * A module, exception or protocol with its rendered XHTML body
 */
export interface DocumentedEntity {
  readonly id: string;
  readonly title: string;
  readonly kind: EntityKind;
  readonly body: string;
  readonly summary?: string;
  readonly members?: readonly EntityMember[];
}

/**
 * A Markdown file converted into a standalone page
 */
export interface SupplementaryDocument {
  readonly sourcePath: string;
  readonly title: string;
  readonly fileName: string;
  readonly body: string;
}
