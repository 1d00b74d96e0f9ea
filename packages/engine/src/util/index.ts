/**
 * Utility modules for the pllcalc engine.
 */

// Logger - centralized logging system
export {
  createLogger,
  configureLogging,
  resetLogging,
  loadLoggingFromEnv,
  getLoggingConfig,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';

// Diagnostics - structured error/warning reporting
export {
  formatDiagnostic,
  warn,
  error,
  type DiagLevel,
  type DiagMeta,
} from './diag.js';
