export {
  ShiftServiceError,
  InvalidParametersError,
  TransportError,
  LoginError,
  SessionExpiredError,
  RemoteError,
  isShiftServiceError,
  type ErrorKind,
  type LoginErrorKind
} from './errors.js';

export {
  Logger,
  createLogger,
  redactSensitive,
  truncateForLog,
  isLogLevel,
  type LogLevel,
  type LoggerConfig
} from './utils/logger.js';

export {
  CookieFetch,
  createCookieFetch,
  type FetchLike,
  type HttpClientConfig,
  type RequestOptions,
  type FetchPageOptions,
  type FetchedPage,
  type HttpResponse
} from './utils/http-client.js';

export { Helpers, NO_DELAY, getErrorMessage, type DelayRange } from './utils/helpers.js';
