export {
  SyncError,
  DuplicateKeyError,
  RemoteError,
  StaleMappingError,
  UnknownTypeError,
  wrapError,
} from './sync-error.js';
export type { ErrorCode, SyncErrorDetails, DuplicateKeyCollision } from './sync-error.js';
