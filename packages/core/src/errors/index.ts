export {
  RegistryError,
  LoadError,
  PersistenceError,
  wrapError,
} from './registry-error.js';
export type {
  ErrorCode,
  LoadErrorCode,
  PersistenceErrorCode,
  RegistryErrorDetails,
} from './registry-error.js';
