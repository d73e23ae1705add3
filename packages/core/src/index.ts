/**
 * @docbinder/core
 *
 * Core package containing:
 * - Documented entity and package configuration types
 * - zod schemas for both
 * - Error handling
 */

// Types
export {
  ENTITY_KINDS,
  MEMBER_KINDS,
  documentedEntitySchema,
  documentedEntityListSchema,
  entityMemberSchema,
} from './types/entity.js';

export type {
  EntityKind,
  MemberKind,
  EntityMember,
  DocumentedEntity,
  SupplementaryDocument,
} from './types/entity.js';

export {
  DEFAULT_CONCURRENCY,
  packageConfigSchema,
} from './types/package.js';

export type {
  PackageConfig,
  PackageConfigInput,
  ResolvedPackageConfig,
  PackageIdentity,
} from './types/package.js';

// Validation
export { parsePackageConfig, parseEntities } from './validation.js';

// Errors
export {
  DocBinderError,
  ValidationError,
  UnsupportedFormatError,
  PackagingError,
} from './errors/index.js';
