// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Config, Feature Flags, Storage Settings
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function envString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function envOptional(key: string): string | null {
  const value = process.env[key];
  return value ? value : null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'staging' | 'production' | 'test';

const ENVIRONMENTS: readonly Environment[] = ['development', 'staging', 'production', 'test'];

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isStaging: boolean;
}

function parseEnvironment(value: string): Environment {
  const match = ENVIRONMENTS.find((env) => env === value);
  return match ?? 'development';
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const env = parseEnvironment(envString('NODE_ENV', 'development'));

  return {
    environment: env,
    isProduction: env === 'production',
    isStaging: env === 'staging',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// FEATURE FLAGS
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'fatal'];

export interface FeatureFlags {
  debugMode: boolean;
  redactPII: boolean;
  logLevel: LogLevelName;
}

export function loadFeatureFlags(): FeatureFlags {
  const debugMode = envBool('DEBUG', false);
  const requested = envString('LOG_LEVEL', '').toLowerCase();
  const logLevel = LOG_LEVEL_NAMES.find((level) => level === requested)
    ?? (debugMode ? 'debug' : 'info');

  return {
    debugMode,
    redactPII: envBool('REDACT_PII', true),
    logLevel,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface ServerConfig {
  host: string;
  port: number;
  jsonBodyLimit: string;
}

export function loadServerConfig(): ServerConfig {
  return {
    host: envString('HOST', '0.0.0.0'),
    port: envNumber('PORT', 8000),
    jsonBodyLimit: envString('JSON_BODY_LIMIT', '100kb'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// DATABASE CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Document database connection settings. Either value may be absent, in
 * which case the service runs without a database.
 */
export interface DatabaseConfig {
  url: string | null;
  name: string | null;
}

export function loadDatabaseConfig(): DatabaseConfig {
  return {
    url: envOptional('DATABASE_URL'),
    name: envOptional('DATABASE_NAME'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppConfig {
  env: EnvironmentConfig;
  features: FeatureFlags;
  server: ServerConfig;
  database: DatabaseConfig;
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    env: loadEnvironmentConfig(),
    features: loadFeatureFlags(),
    server: loadServerConfig(),
    database: loadDatabaseConfig(),
  };

  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}
