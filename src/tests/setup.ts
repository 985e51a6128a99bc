// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP — Quiet Logging and a Clean Database Environment
// ═══════════════════════════════════════════════════════════════════════════════

// Runs before each test file is imported, so the first loadConfig() sees these.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'fatal';
delete process.env.DATABASE_URL;
delete process.env.DATABASE_NAME;
