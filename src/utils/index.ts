export { logger, setVerbose } from './logger.js';
export {
  ArgumentError,
  AuthorizationError,
  ConfigurationError,
  ProviderError,
  RenameError,
  StampError,
  SubprocessError,
  describeError,
  hasErrorCode,
  isFatal,
} from './errors.js';
