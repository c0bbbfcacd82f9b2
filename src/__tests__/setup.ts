/**
 * Test setup file for vitest.
 *
 * Sets environment variables BEFORE any application module is imported so
 * config/env.ts validates against a known configuration. Tests use the
 * in-memory store; nothing connects to PostgreSQL.
 */

process.env.NODE_ENV = "test";
process.env.STORE_PROVIDER = "memory";
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "error";
process.env.ADMIN_API_KEY = "test-admin-key";
process.env.BASE_URL = "http://localhost:8097/";
process.env.APP_NAME = "Pastebin";
