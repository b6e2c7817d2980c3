// ============================================
// Agent Tools Core
// ============================================

/**
 * @module @agent-tools/core
 *
 * Ambient services shared by every package: logging, error types and
 * environment-driven configuration.
 */

export * from "./config/index.js";
export * from "./errors/index.js";
export * from "./logger/index.js";
