// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Leveled Console Logger with Contact-Detail Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// Production and staging write one JSON object per line; every other
// environment writes a colored line followed by indented metadata.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type LogLevelName } from '../config/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = LogLevelName;

/** Fields attached to every entry a logger writes. */
export interface LogBindings {
  component?: string;
  requestId?: string;
}

interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

interface LogEntry extends LogBindings {
  timestamp: string;
  level: LogLevel;
  message: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

interface LoggerSettings {
  minLevel: LogLevel;
  redact: boolean;
  json: boolean;
}

type Metadata = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const RESET = '\x1b[0m';

// ─────────────────────────────────────────────────────────────────────────────────
// REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const EMAIL = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE = /(\+?\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/g;
const SENSITIVE_KEY = /password|secret|token|authorization|^database_?url$/i;
const MAX_REDACT_DEPTH = 5;

function scrubText(text: string): string {
  return text.replace(EMAIL, '[EMAIL]').replace(PHONE, '[PHONE]');
}

function scrubValue(value: unknown, depth: number): unknown {
  if (typeof value === 'string') return scrubText(value);
  if (depth >= MAX_REDACT_DEPTH) return '[MAX_DEPTH]';
  if (Array.isArray(value)) return value.map((item) => scrubValue(item, depth + 1));
  if (value instanceof Date || value === null || typeof value !== 'object') return value;
  return scrubRecord(Object.fromEntries(Object.entries(value)), depth + 1);
}

function scrubRecord(record: Metadata, depth = 0): Metadata {
  const scrubbed: Metadata = {};
  for (const [key, value] of Object.entries(record)) {
    scrubbed[key] = SENSITIVE_KEY.test(key) ? '[REDACTED]' : scrubValue(value, depth);
  }
  return scrubbed;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RENDERING
// ─────────────────────────────────────────────────────────────────────────────────

function renderPretty(entry: LogEntry): string[] {
  const tags = [entry.requestId?.slice(0, 8), entry.component]
    .filter((tag): tag is string => Boolean(tag))
    .map((tag) => `[${tag}]`)
    .join('');
  const level = `${LEVEL_COLOR[entry.level]}${entry.level.toUpperCase().padEnd(5)}${RESET}`;
  const lines = [`${entry.timestamp} ${level} ${tags} ${entry.message}`];

  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    lines.push(`   ${JSON.stringify(entry.metadata)}`);
  }
  if (entry.error) {
    lines.push(`  Error: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) {
      lines.push(...entry.error.stack.split('\n').slice(1, 4).map((frame) => `  ${frame}`));
    }
  }
  return lines;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER
// ─────────────────────────────────────────────────────────────────────────────────

let cachedSettings: LoggerSettings | null = null;

function currentSettings(): LoggerSettings {
  if (!cachedSettings) {
    const config = loadConfig();
    cachedSettings = {
      minLevel: config.features.logLevel,
      redact: config.features.redactPII,
      json: config.env.isProduction || config.env.isStaging,
    };
  }
  return cachedSettings;
}

export class Logger {
  private readonly bindings: LogBindings;
  private readonly settings: LoggerSettings;

  constructor(bindings: LogBindings = {}) {
    this.bindings = { ...bindings };
    this.settings = currentSettings();
  }

  debug(message: string, metadata?: Metadata): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata?: Metadata): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata?: Metadata): void {
    this.write('warn', message, metadata);
  }

  error(message: string, error?: Error, metadata?: Metadata): void {
    this.write('error', message, metadata, error);
  }

  fatal(message: string, error?: Error, metadata?: Metadata): void {
    this.write('fatal', message, metadata, error);
  }

  private write(level: LogLevel, message: string, metadata?: Metadata, error?: Error): void {
    const { minLevel, redact, json } = this.settings;
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redact ? scrubText(message) : message,
      ...this.bindings,
    };
    if (metadata) {
      entry.metadata = redact ? scrubRecord(metadata) : metadata;
    }
    if (error) {
      // Stacks can carry request data in frames, so they go with redaction.
      entry.error = redact
        ? { name: error.name, message: scrubText(error.message) }
        : { name: error.name, message: error.message, stack: error.stack };
    }

    if (json) {
      console.log(JSON.stringify(entry));
    } else {
      for (const line of renderPretty(entry)) console.log(line);
    }
  }
}

/**
 * Logger bound to the given fields. Settings are read from config once and
 * shared until {@link resetLogger}.
 */
export function getLogger(bindings: LogBindings = {}): Logger {
  return new Logger(bindings);
}

/** Forget cached settings so loggers created afterwards see reloaded config. */
export function resetLogger(): void {
  cachedSettings = null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HTTP ACCESS LOG
// ─────────────────────────────────────────────────────────────────────────────────

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  requestId: string;
  userAgent?: string;
  ip?: string;
}

export function logRequest(data: RequestLogData): void {
  const logger = getLogger({ component: 'http', requestId: data.requestId });
  const message = `${data.method} ${data.path} ${data.statusCode}`;
  const metadata = { duration: data.duration, userAgent: data.userAgent, ip: data.ip };

  if (data.statusCode >= 500) {
    logger.error(message, undefined, metadata);
  } else if (data.statusCode >= 400) {
    logger.warn(message, metadata);
  } else {
    logger.info(message, metadata);
  }
}
