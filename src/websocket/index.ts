/**
 * Streaming session module for OpenAlgo market data.
 *
 * One socket, a registry of live subscriptions and a last-value cache,
 * with an auto-subscribing read path for pollers.
 *
 * @example
 * ```typescript
 * import { websocket } from "openalgo-stream";
 *
 * const session = await websocket.StreamSession.open({ apiKey: "your-api-key" });
 *
 * session.on((event) => {
 *   if (event.type === "MarketData") {
 *     console.log(event.key.symbol, event.payload.data.ltp);
 *   }
 * });
 *
 * await session.subscribe("RELIANCE", "NSE", websocket.MODE.LTP);
 * ```
 *
 * @module websocket
 */

// Session
export { StreamSession } from "./session";
export type { StreamSessionConfig, EventCallback } from "./session";

// Connection
export { Connection } from "./connection";
export type {
  ConnectionConfig,
  ConnectionHandlers,
  ConnectionState,
  ConfirmationMode,
  ConnectOutcome,
} from "./connection";

// Error types
export { StreamError, errorMessage, errorStatus, toStreamError } from "./error";
export type { StreamErrorVariant } from "./error";

// Constants
export {
  DEFAULT_WS_URL,
  AUTH_TIMEOUT_MS,
  SUBSCRIPTION_TIMEOUT_MS,
  ASSUMED_AUTH_GRACE_MS,
  DEFAULT_DEPTH_LEVEL,
  SENTINEL,
} from "./constants";

// Types
export type {
  Mode,
  ModeName,
  SubscriptionKey,
  AuthenticateRequest,
  SubscribeRequest,
  UnsubscribeRequest,
  StreamRequest,
  AuthenticationMessage,
  SubscriptionMessage,
  MarketData,
  MarketDataMessage,
  InboundMessage,
  StreamEvent,
} from "./types";

export {
  MODE,
  isMode,
  modeName,
  subscriptionKey,
  toSubscriptionKey,
  keyId,
  parseKeyId,
  createAuthenticateRequest,
  createSubscribeRequest,
  createUnsubscribeRequest,
  parseStreamMessage,
  marketDataKey,
  AuthenticationMessageSchema,
  SubscriptionMessageSchema,
  MarketDataSchema,
  MarketDataMessageSchema,
} from "./types";

// State management
export { MarketDataCache } from "./state";
export { PendingRequests } from "./pending";

// Subscription management
export { SubscriptionRegistry } from "./subscriptions";
export type { SubscriptionRecord } from "./subscriptions";

// Message handlers
export { MessageHandler } from "./handlers";
export type { DispatchContext } from "./handlers";

// Polling
export { AutoSubscribeFacade, sentinelText } from "./facade";
export type { ReadResult, SubscriptionSource } from "./facade";

// Host projections
export { StreamFunctions } from "./functions";
export {
  ltpCell,
  quoteTable,
  depthTable,
  fieldCell,
  subscriptionsTable,
  debugTable,
  toNumber,
  cellText,
} from "./views";
export type { Cell, Table, DebugInfo, DepthLevel } from "./views";
