// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Environment Loading and Feature Flags
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  loadConfig,
  reloadConfig,
  loadEnvironmentConfig,
  loadFeatureFlags,
  loadServerConfig,
  loadDatabaseConfig,
} from '../index.js';

const TOUCHED_KEYS = [
  'NODE_ENV',
  'DEBUG',
  'LOG_LEVEL',
  'REDACT_PII',
  'HOST',
  'PORT',
  'JSON_BODY_LIMIT',
  'DATABASE_URL',
  'DATABASE_NAME',
];

let saved: Record<string, string | undefined>;

beforeEach(() => {
  saved = {};
  for (const key of TOUCHED_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of TOUCHED_KEYS) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  reloadConfig();
});

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadEnvironmentConfig', () => {
  it('should default to development', () => {
    expect(loadEnvironmentConfig()).toEqual({
      environment: 'development',
      isProduction: false,
      isStaging: false,
    });
  });

  it('should recognise production', () => {
    process.env.NODE_ENV = 'production';
    const env = loadEnvironmentConfig();
    expect(env.environment).toBe('production');
    expect(env.isProduction).toBe(true);
  });

  it('should fall back to development for unknown values', () => {
    process.env.NODE_ENV = 'qa';
    expect(loadEnvironmentConfig().environment).toBe('development');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// FEATURE FLAGS
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadFeatureFlags', () => {
  it('should use defaults', () => {
    expect(loadFeatureFlags()).toEqual({
      debugMode: false,
      redactPII: true,
      logLevel: 'info',
    });
  });

  it('should switch to debug logging in debug mode', () => {
    process.env.DEBUG = 'true';
    expect(loadFeatureFlags().logLevel).toBe('debug');
  });

  it('should honour an explicit log level, case-insensitively', () => {
    process.env.DEBUG = '1';
    process.env.LOG_LEVEL = 'WARN';
    expect(loadFeatureFlags().logLevel).toBe('warn');
  });

  it('should ignore an unknown log level', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(loadFeatureFlags().logLevel).toBe('info');
  });

  it('should parse boolean flags', () => {
    process.env.REDACT_PII = 'no';
    expect(loadFeatureFlags().redactPII).toBe(false);
    process.env.REDACT_PII = 'YES';
    expect(loadFeatureFlags().redactPII).toBe(true);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER & DATABASE
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadServerConfig', () => {
  it('should listen on 0.0.0.0:8000 by default', () => {
    expect(loadServerConfig()).toEqual({
      host: '0.0.0.0',
      port: 8000,
      jsonBodyLimit: '100kb',
    });
  });

  it('should read PORT and HOST', () => {
    process.env.PORT = '9090';
    process.env.HOST = '127.0.0.1';
    expect(loadServerConfig()).toMatchObject({ host: '127.0.0.1', port: 9090 });
  });

  it('should keep the default port for non-numeric values', () => {
    process.env.PORT = 'http';
    expect(loadServerConfig().port).toBe(8000);
  });
});

describe('loadDatabaseConfig', () => {
  it('should report missing settings as null', () => {
    expect(loadDatabaseConfig()).toEqual({ url: null, name: null });
  });

  it('should treat empty values as missing', () => {
    process.env.DATABASE_URL = '';
    process.env.DATABASE_NAME = 'imagine';
    expect(loadDatabaseConfig()).toEqual({ url: null, name: 'imagine' });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  it('should cache until reloaded', () => {
    const first = reloadConfig();
    process.env.PORT = '9191';

    expect(loadConfig()).toBe(first);
    expect(loadConfig().server.port).toBe(8000);
    expect(reloadConfig().server.port).toBe(9191);
  });

  it('should group every section', () => {
    process.env.DATABASE_NAME = 'imagine';

    const config = reloadConfig();

    expect(config.env.environment).toBe('development');
    expect(config.server.port).toBe(8000);
    expect(config.database).toEqual({ url: null, name: 'imagine' });
    expect(config.features.redactPII).toBe(true);
  });
});
