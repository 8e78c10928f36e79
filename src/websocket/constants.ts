/** Default OpenAlgo WebSocket endpoint */
export const DEFAULT_WS_URL = "ws://127.0.0.1:8765";

/** How long confirmed mode waits for the authentication result */
export const AUTH_TIMEOUT_MS = 30000;

/** How long confirmed mode waits for a subscription ack */
export const SUBSCRIPTION_TIMEOUT_MS = 30000;

/** Grace period assumed mode waits before treating the API key as accepted */
export const ASSUMED_AUTH_GRACE_MS = 500;

/** Depth levels requested for mode 3 when the caller gives none */
export const DEFAULT_DEPTH_LEVEL = 5;

/** How long close() waits for the close handshake before terminating */
export const CLOSE_TIMEOUT_MS = 1000;

/** Heartbeat tokens (plain text, not JSON) */
export const HEARTBEAT_PING = "ping";
export const HEARTBEAT_PONG = "pong";

/**
 * Placeholder texts returned to pollers instead of data.
 */
export const SENTINEL = {
  Unsubscribed: "Unsubscribed",
  Subscribing: "Subscribing...",
  WaitingForData: "Waiting for data...",
} as const;
