// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Factories (for DI registration)
export { PinoLoggerFactory, FixedLoggerFactory, createRootLogger } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { LOG_LEVELS, isLogLevel, resolveLogLevel } from './level.js';

// Redaction config (for testing/verification)
export { REDACTION_CONFIG } from './redaction.js';
