/**
 * Structured logging with secret redaction
 *
 * Security requirements:
 * - Never log passwords or session tokens in plaintext
 * - Redact sensitive headers (Authorization, Cookie)
 * - Support structured JSON logging for log collectors
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Include stack traces in human-readable output (default: false) */
  stacks?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens (Uptime Kuma session tokens are JWTs)
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // Uptime Kuma API keys
  /uk\d+_[a-zA-Z0-9_-]{10,}/g,

  // Credentials embedded in URLs
  /(?<=:\/\/[^:/\s]+:)[^@/\s]+(?=@)/g,
];

/**
 * Header and object keys whose values are always redacted
 */
const SENSITIVE_KEYS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'proxy-authorization',
  'password',
  'token',
  'apitoken',
  'api_token',
  'secret',
  'credentials',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('eyJhbGciOiJIUzI1NiJ9') // 'eyJh...NiJ9'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in a value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  if (value instanceof URL) {
    return redactPatterns(value.toString());
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      if (typeof entry === 'string' && entry.length > 0) {
        result[key] = redactString(entry);
      } else if (entry !== null && entry !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = entry;
      }
    } else {
      result[key] = redactValue(entry, depth + 1);
    }
  }

  return result;
}

/**
 * Redact every value of a context record
 */
export function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(context)) {
    result[key] = SENSITIVE_KEYS.has(key.toLowerCase())
      ? typeof entry === 'string' && entry.length > 0
        ? redactString(entry)
        : '[REDACTED]'
      : redactValue(entry);
  }
  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with JSON output and automatic secret redaction
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      stacks: config.stacks ?? false,
    };
    this.baseContext = redactContext(baseContext);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.baseContext, ...(context ? redactContext(context) : {}) };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  format(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (this.config.stacks && entry.error.stack) {
        parts.push(`\n  ${entry.error.stack}`);
      }
    }

    return parts.join(' ');
  }

  // Logs always go to stderr so `--json` output on stdout stays parseable.
  private output(entry: LogEntry): void {
    console.error(this.format(entry));
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.output(this.createEntry(level, message, context, error));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Log an outgoing HTTP request
   */
  request(method: string, url: string): void {
    this.debug('HTTP Request', { method, url: redactPatterns(url) });
  }

  /**
   * Log an HTTP response; 4xx/5xx are logged at warn
   */
  response(status: number, url: string, durationMs?: number): void {
    const level: LogLevel = status >= 400 ? 'warn' : 'debug';
    this.log(level, `HTTP Response ${status}: ${redactPatterns(url)}`, { status, durationMs });
  }

  /**
   * Create a child logger that adds context to every entry
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.baseContext, ...context });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Parse a log level from the environment, ignoring unknown values
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}

/**
 * Logger settings from VERSION_SYNC_LOG_LEVEL, VERSION_SYNC_LOG_JSON and
 * VERSION_SYNC_LOG_STACKS
 */
export function loggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: parseLogLevel(env.VERSION_SYNC_LOG_LEVEL),
    json: env.VERSION_SYNC_LOG_JSON === 'true',
    stacks: env.VERSION_SYNC_LOG_STACKS === 'true',
  };
}

/**
 * Default logger instance
 */
export const logger = new ApiLogger(loggerConfigFromEnv());

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
