/**
 * pllcalc Logger
 *
 * Centralized logging utility for the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (search, registry, cli, ...)
 * - Structured logging support
 * - Configuration from environment variables
 * - Safe production defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from '@pllcalc/engine';
 *
 * const log = createLogger('registry');
 *
 * log.debug('Computing configuration');
 * log.info({ event: 'cached', khz: 480000 });
 * log.warn('Locked reference divider is outside its range');
 * log.error('Invalid clock parameters', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
const DEFAULT_CONFIG: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: true,
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && levelOrder.some(l => l === value);
}

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['registry', 'cli'],
 *   timestamps: false
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('info')) {
    console.info('[pllcalc] Logging configured:', config);
  }
}

/** Restore the default error-only configuration. */
export function resetLogging(): void {
  config = { ...DEFAULT_CONFIG };
  moduleSet.clear();
}

/**
 * Load logging configuration from environment variables.
 * Looks for: PLLCALC_LOGLEVEL=debug, PLLCALC_DEBUG=registry,cli
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const rawLevel = env.PLLCALC_LOGLEVEL?.trim().toLowerCase();
  const modulesStr = env.PLLCALC_DEBUG;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (rawLevel && !isLogLevel(rawLevel)) {
    createLogger('logger').warn(`Ignoring unknown PLLCALC_LOGLEVEL '${rawLevel}'`);
  }
  const level = isLogLevel(rawLevel) ? rawLevel : undefined;

  if (level || modules) {
    configureLogging({
      // A module list on its own implies debug output for those modules
      level: level ?? (modules ? 'debug' : config.level),
      modules,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

function output(level: Exclude<LogLevel, 'none'>, module: string, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module}]`;
  const method = level === 'debug' ? 'log' : level;
  console[method](prefix, ...args);
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'search', 'registry', 'cli')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) {
        output('error', module, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) {
        output('warn', module, args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) {
        output('info', module, args);
      }
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) {
        output('debug', module, args);
      }
    },
  };
}

export default createLogger;
