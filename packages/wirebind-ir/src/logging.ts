// Namespaced debug logging.
//
// Uses the DEBUG environment variable pattern matching (like npm's debug
// package): `DEBUG=wirebind:*`, `DEBUG=wirebind:server,-wirebind:loader`.

/** Structured log sink; defaults to the console. */
export interface LogSink {
  debug(message: string, data: Record<string, unknown>): void;
  warn(message: string, data: Record<string, unknown>): void;
}

export interface Logger {
  readonly namespace: string;
  /** Whether debug output is currently enabled for this namespace. */
  readonly enabled: boolean;
  debug(message: string, data?: Record<string, unknown>): void;
  /** Warnings are always emitted. */
  warn(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Environment to read DEBUG from. Defaults to process.env, read on every call. */
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  debug(message, data) {
    console.log(message, data);
  },
  warn(message, data) {
    console.warn(message, data);
  },
};

/**
 * Check if a namespace is enabled by a DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for a namespace such as `wirebind:server`.
 *
 * @example
 * ```typescript
 * const log = createLogger("wirebind:server");
 * log.debug("instantiated", { server: "server:EchoServer:1" });
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const env = (): NodeJS.ProcessEnv => options.env ?? process.env;

  return {
    namespace,
    get enabled() {
      return isEnabled(namespace, env().DEBUG);
    },
    debug(message, data = {}) {
      if (!isEnabled(namespace, env().DEBUG)) return;
      sink.debug(`${namespace} ${message}`, data);
    },
    warn(message, data = {}) {
      sink.warn(`${namespace} ${message}`, data);
    },
  };
}
