// Logger
export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

// Errors
export {
  AppError,
  ValidationError,
  CaseIsolationError,
  RateLimitError,
  ExternalServiceError,
  DatabaseOperationError,
  isOperationalError,
  toSafeErrorResponse,
  errorMessage,
  type SafeErrorDetails,
} from './errors.js';

// Utils
export { withRetry, sleep, clamp, type RetryOptions } from './utils.js';

// Circuit Breaker
export {
  CircuitBreaker,
  CircuitBreakerError,
  CircuitBreakerRegistry,
  CircuitState,
  globalCircuitBreakerRegistry,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
} from './circuit-breaker.js';

// Cache
export * from './cache/index.js';
