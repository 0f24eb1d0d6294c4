/**
 * Logger - Structured logging with automatic context injection
 *
 * Built on pino, with automatic injection of:
 * - Thread identity (main or background) of the running pass
 * - Trace id of the current kernel context
 * - Custom metadata
 *
 * @example
 * ```typescript
 * import { Logger } from 'arbor-kernel';
 *
 * // Configure once at app start
 * Logger.configure({ level: 'debug' });
 *
 * // Create scoped child logger
 * const log = Logger.for('Resolver');
 * log.debug({ component: 'Text' }, 'Resolved component');
 * ```
 */

import pino, {
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { Context, type KernelContext } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels supported by the kernel logger, least to most severe.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Function to extract fields from KernelContext for logging.
 * Return an object with fields to include in every log entry.
 */
export type ContextFieldsExtractor = (ctx: KernelContext) => Record<string, unknown>;

export interface LoggerConfig {
  /** Log level (default: 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /** Auto-inject execution context into every log (default: true) */
  includeContext?: boolean;
  /** Custom function to extract fields from context */
  contextFields?: ContextFieldsExtractor;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Custom mixin function for additional properties */
  mixin?: () => Record<string, unknown>;
  /** Pretty print through pino-pretty (default: true only if NODE_ENV === 'development') */
  prettyPrint?: boolean;
  /**
   * Replace existing config instead of merging (default: false).
   */
  replace?: boolean;
}

/**
 * Log method signature supporting both message-first and object-first forms.
 *
 * @example
 * ```typescript
 * log.info('Pass committed');
 * log.error({ err, component: 'Text' }, 'Resolution failed');
 * ```
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

/**
 * Kernel logger interface with structured logging and context injection.
 */
export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): KernelLogger;

  /** Get the current log level */
  level: LogLevel;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

const defaultContextFieldsExtractor: ContextFieldsExtractor = (ctx) => {
  const fields: Record<string, unknown> = {};

  if (ctx.traceId) fields.trace_id = ctx.traceId;
  fields.thread = ctx.thread.name;

  return fields;
};

/**
 * Extract context fields for logging.
 * Called on every log to inject current execution context.
 */
function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }

  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  const extractor = config.contextFields ?? defaultContextFieldsExtractor;
  return extractor(ctx);
}

function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const usePretty = config.prettyPrint ?? process.env.NODE_ENV === "development";

  const options: LoggerOptions = {
    level: config.level ?? "info",
    base: config.base ?? { pid: process.pid },

    // Mixin runs on every log to inject context
    mixin: () => {
      const contextFields = getContextFields(config);
      const customFields = config.mixin?.() ?? {};
      return { ...contextFields, ...customFields };
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function toLogLevel(level: string): LogLevel {
  return isLogLevel(level) ? level : "info";
}

function wrapLogger(pinoLogger: PinoLogger): KernelLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): KernelLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return toLogLevel(pinoLogger.level);
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = pino(createPinoOptions(globalConfig));
  }
  return globalLogger;
}

type LevelMethod = Exclude<LogLevel, "silent">;

function forward(resolve: () => KernelLogger, level: LevelMethod): LogMethod {
  return (first: string | Record<string, unknown>, ...rest: unknown[]): void => {
    const target = resolve()[level];
    if (typeof first === "string") {
      target(first, ...rest);
      return;
    }
    const [msg, ...args] = rest;
    target(first, typeof msg === "string" ? msg : undefined, ...args);
  };
}

/**
 * Route a module-scoped logger through the current global pino instance, so
 * loggers created at import time pick up a later `Logger.configure`.
 */
function lazyLogger(bindings: Record<string, unknown>): KernelLogger {
  let cached: { source: PinoLogger; child: KernelLogger } | null = null;
  const resolve = (): KernelLogger => {
    const source = getOrCreateGlobalLogger();
    if (cached === null || cached.source !== source) {
      cached = { source, child: wrapLogger(source.child(bindings)) };
    }
    return cached.child;
  };

  return {
    trace: forward(resolve, "trace"),
    debug: forward(resolve, "debug"),
    info: forward(resolve, "info"),
    warn: forward(resolve, "warn"),
    error: forward(resolve, "error"),
    fatal: forward(resolve, "fatal"),
    child: (childBindings) => resolve().child(childBindings),
    get level(): LogLevel {
      return resolve().level;
    },
    isLevelEnabled: (level) => resolve().isLevelEnabled(level),
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton for Arbor.
 *
 * @example
 * ```typescript
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.for('Reconciler');
 * log.debug({ key: 'root,Column' }, 'Reusing subtree');
 * ```
 */
export const Logger = {
  /**
   * Configure the global logger.
   * Should be called once at application startup.
   */
  configure(config: LoggerConfig): void {
    if (config.replace) {
      globalConfig = config;
    } else {
      globalConfig = { ...globalConfig, ...config };
    }

    if (config.contextFields) {
      globalConfig.contextFields = composeContextFields(defaultContextFields, config.contextFields);
    } else if (!globalConfig.contextFields) {
      globalConfig.contextFields = defaultContextFields;
    }

    globalLogger = pino(createPinoOptions(globalConfig));
  },

  /**
   * Get the global logger instance.
   */
  get(): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Create a child logger scoped to a module or object (uses constructor.name).
   *
   * Safe to call at module load: the returned logger follows later
   * `configure` calls.
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;
    return lazyLogger({ component: name });
  },

  /**
   * Create a child logger with custom bindings.
   */
  child(bindings: Record<string, unknown>): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Create a standalone logger instance with custom config.
   * Does not affect the global logger.
   */
  create(config: LoggerConfig = {}): KernelLogger {
    return wrapLogger(pino(createPinoOptions(config)));
  },

  get level(): LogLevel {
    return toLogLevel(getOrCreateGlobalLogger().level);
  },

  /**
   * Set the log level at runtime.
   */
  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compose multiple context field extractors into one.
 * Later extractors override earlier ones for the same keys.
 */
export function composeContextFields(
  ...extractors: ContextFieldsExtractor[]
): ContextFieldsExtractor {
  return (ctx) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(ctx));
    }
    return result;
  };
}

/**
 * The default context fields extractor (trace id and thread name).
 */
export const defaultContextFields = defaultContextFieldsExtractor;

export type { PinoLogger, TransportSingleOptions, TransportMultiOptions };
