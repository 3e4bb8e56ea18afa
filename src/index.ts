export { ScopedPath } from './scoped-path.js';
export type { ScopedPathLike } from './scoped-path.js';
export { ScopedPathGroup } from './scoped-path-group.js';
export { withScopedPath } from './with-scoped-path.js';
export { ScopedPathConfig } from './path-config.js';
export type { Logger, ScopedPathOptions } from './path-config.js';
export {
  hasErrorCode,
  isAbsentError,
  nodeFileSystem,
  removePath,
  statEntry,
} from './file-system.js';
export type { EntryStats, FileSystem } from './file-system.js';

export { default as SemanticReleaseError } from '@semantic-release/error';
