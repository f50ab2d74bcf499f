/**
 * Jest Setup
 *
 * Runs before each test file is loaded.
 */

// Loggers read LOG_LEVEL at import time
process.env.LOG_LEVEL = "silent";
process.env.NODE_ENV = "test";
