import { getEnv } from '../config/env.js';

// --- Types ---

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  msg: string;
  timestamp: string;
  service: string;
  component?: string;
  pageUrl?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  component?: string;
}

// --- Log level ordering ---

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// --- Secret redaction ---

// Matched as substrings of the lower-cased key.
const SENSITIVE_KEYS = [
  'password',
  'passwd',
  'secret',
  'token',
  'api_key',
  'apikey',
  'api-key',
  'authorization',
  'cookie',
  'credential',
  'private_key',
  'privatekey',
  'ssn',
  'social_security',
  'card_number',
  'cvv',
];

const SENSITIVE_PATTERNS = [
  /sk-ant-[a-zA-Z0-9_-]{8,}/g, // Anthropic keys
  /(?:sk|pk|key|token|secret|password)[_-]?[a-zA-Z0-9]{16,}/g,
  /(?:eyJ)[a-zA-Z0-9._-]{20,}/g, // JWTs
  /(?:ws|wss):\/\/[^\s"']+/g, // CDP WebSocket URLs
  /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
  /\b\d{3}-\d{2}-\d{4}\b/g, // SSN format (xxx-xx-xxxx)
  /\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b/g, // Card numbers
];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive));
}

function redactString(value: string): string {
  let redacted = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    redacted = redacted.replace(pattern, '[REDACTED]');
  }
  return redacted;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactValue(key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (isPlainObject(value)) return redactObject(value);
  if (Array.isArray(value)) return value.map((item) => redactValue(key, item));
  if (typeof value === 'string') {
    return isSensitiveKey(key) ? '[REDACTED]' : redactString(value);
  }
  return value;
}

export function redactObject(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = redactValue(key, value);
  }
  return result;
}

// --- Logger class ---

export class Logger {
  private level: LogLevel;
  private service: string;
  private context: Record<string, unknown>;

  constructor(opts: LoggerOptions = {}) {
    const env = getEnv();
    this.level = opts.level ?? env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');
    this.service = opts.service ?? 'formgate';
    this.context = {};

    if (opts.component) this.context.component = opts.component;
  }

  child(bindings: Record<string, unknown>): Logger {
    const child = new Logger({
      level: this.level,
      service: this.service,
    });
    child.context = { ...this.context, ...bindings };
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      msg,
      timestamp: new Date().toISOString(),
      service: this.service,
      ...redactObject(this.context),
      ...(data ? redactObject(data) : {}),
    };

    const line = JSON.stringify(entry);

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}

// --- Shared instance ---

let _defaultLogger: Logger | null = null;

/**
 * Process-wide logger. Passing options replaces the shared instance, which
 * the CLI does once at startup; components take a child of it.
 */
export function getLogger(opts?: LoggerOptions): Logger {
  if (!_defaultLogger || opts) {
    _defaultLogger = new Logger(opts);
  }
  return _defaultLogger;
}
