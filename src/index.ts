/**
 * OpenAlgo streaming client - real-time market data over WebSocket.
 *
 * This package provides:
 * - `websocket`: the streaming session, its registry, cache and host projections
 * - configuration loaded from the environment
 * - the shared pino logger
 *
 * @example
 * ```typescript
 * import { StreamSession, sessionConfigFromEnv } from "openalgo-stream";
 *
 * const session = new StreamSession(sessionConfigFromEnv());
 * console.log(await session.connect());
 * console.log(await session.read("RELIANCE", "NSE", 1));
 * ```
 */

// ============================================================================
// MODULE EXPORTS
// ============================================================================

/**
 * Streaming module.
 * Session, subscriptions, market data cache and host functions.
 */
export * as websocket from "./websocket";

export { StreamSession, StreamFunctions, StreamError, MODE } from "./websocket";
export type { StreamSessionConfig, StreamEvent, ReadResult } from "./websocket";

/**
 * Environment configuration.
 */
export { getEnv, loadEnv, loadLogEnv, sessionConfigFromEnv } from "./config";
export type { Env, LogEnv } from "./config";

/**
 * Logging.
 */
export { logger, createChildLogger } from "./logger";
export type { Logger } from "./logger";
