export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  StartupFailedError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, errorMessageOf } from './formatter.js';
