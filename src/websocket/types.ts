/**
 * Message types for the OpenAlgo WebSocket protocol.
 *
 * Outbound requests are plain interfaces built by the helpers below.
 * Inbound messages are validated with zod before they reach the dispatcher.
 */

import { z } from "zod";
import { StreamError } from "./error";

// ============================================================================
// MODES
// ============================================================================

/**
 * Market data granularity: 1 = LTP, 2 = Quote, 3 = Depth.
 */
export type Mode = 1 | 2 | 3;

/** Named modes */
export const MODE = {
  LTP: 1,
  Quote: 2,
  Depth: 3,
} as const;

export type ModeName = keyof typeof MODE;

/**
 * Check that a number is a valid mode.
 */
export function isMode(value: number): value is Mode {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Get the display name of a mode.
 */
export function modeName(mode: Mode): ModeName {
  switch (mode) {
    case 1:
      return "LTP";
    case 2:
      return "Quote";
    case 3:
      return "Depth";
  }
}

// ============================================================================
// SUBSCRIPTION KEY
// ============================================================================

/**
 * Identity of one live feed. Matching is exact and case-sensitive.
 */
export interface SubscriptionKey {
  readonly symbol: string;
  readonly exchange: string;
  readonly mode: Mode;
}

/**
 * Create a frozen subscription key.
 */
export function subscriptionKey(
  symbol: string,
  exchange: string,
  mode: Mode
): SubscriptionKey {
  return Object.freeze({ symbol, exchange, mode });
}

/**
 * Validate caller input and build a key.
 * @throws {StreamError} InvalidArgument on empty symbol/exchange or unknown mode
 */
export function toSubscriptionKey(
  symbol: string,
  exchange: string,
  mode: number
): SubscriptionKey {
  if (!symbol?.trim() || !exchange?.trim()) {
    throw StreamError.invalidArgument("Symbol and Exchange are required");
  }
  if (!isMode(mode)) {
    throw StreamError.invalidArgument("Mode must be 1 (LTP), 2 (Quote), or 3 (Depth)");
  }
  return subscriptionKey(symbol, exchange, mode);
}

/**
 * String form of a key, used for map lookups and listings.
 */
export function keyId(key: SubscriptionKey): string {
  return `${key.symbol}|${key.exchange}|${key.mode}`;
}

/**
 * Parse the string form back into a key.
 */
export function parseKeyId(id: string): SubscriptionKey | undefined {
  const parts = id.split("|");
  if (parts.length !== 3) return undefined;
  const [symbol, exchange, rawMode] = parts;
  const mode = Number(rawMode);
  if (!symbol || !exchange || !isMode(mode)) return undefined;
  return subscriptionKey(symbol, exchange, mode);
}

// ============================================================================
// REQUEST TYPES (Client → Server)
// ============================================================================

export interface AuthenticateRequest {
  action: "authenticate";
  api_key: string;
}

export interface SubscribeRequest {
  action: "subscribe";
  symbol: string;
  exchange: string;
  mode: Mode;
  depth_level?: number;
}

export interface UnsubscribeRequest {
  action: "unsubscribe";
  symbol: string;
  exchange: string;
  mode: Mode;
}

export type StreamRequest = AuthenticateRequest | SubscribeRequest | UnsubscribeRequest;

/**
 * Create an authenticate request.
 */
export function createAuthenticateRequest(apiKey: string): AuthenticateRequest {
  return { action: "authenticate", api_key: apiKey };
}

/**
 * Create a subscribe request. `depth_level` is only sent for mode 3.
 */
export function createSubscribeRequest(
  key: SubscriptionKey,
  depthLevel?: number
): SubscribeRequest {
  const request: SubscribeRequest = {
    action: "subscribe",
    symbol: key.symbol,
    exchange: key.exchange,
    mode: key.mode,
  };
  if (key.mode === MODE.Depth && depthLevel !== undefined) {
    request.depth_level = depthLevel;
  }
  return request;
}

/**
 * Create an unsubscribe request.
 */
export function createUnsubscribeRequest(key: SubscriptionKey): UnsubscribeRequest {
  return {
    action: "unsubscribe",
    symbol: key.symbol,
    exchange: key.exchange,
    mode: key.mode,
  };
}

// ============================================================================
// RESPONSE TYPES (Server → Client)
// ============================================================================

// Servers are not consistent about sending the mode as a number or a string.
const ModeSchema = z.coerce
  .number()
  .pipe(z.union([z.literal(1), z.literal(2), z.literal(3)]));

const EnvelopeSchema = z.object({ type: z.string() }).passthrough();

export const AuthenticationMessageSchema = z
  .object({
    type: z.literal("authentication"),
    status: z.string(),
    message: z.string().optional(),
  })
  .passthrough();
export type AuthenticationMessage = z.infer<typeof AuthenticationMessageSchema>;

export const SubscriptionMessageSchema = z
  .object({
    type: z.literal("subscription"),
    status: z.string(),
    symbol: z.string().min(1),
    exchange: z.string().min(1),
    mode: ModeSchema,
    message: z.string().optional(),
  })
  .passthrough();
export type SubscriptionMessage = z.infer<typeof SubscriptionMessageSchema>;

/**
 * Quote fields vary by broker, so only the routing fields are required.
 */
export const MarketDataSchema = z
  .object({
    symbol: z.string().min(1),
    exchange: z.string().min(1),
  })
  .passthrough();
export type MarketData = z.infer<typeof MarketDataSchema>;

export const MarketDataMessageSchema = z
  .object({
    type: z.literal("market_data"),
    mode: ModeSchema,
    topic: z.string().optional(),
    data: MarketDataSchema,
  })
  .passthrough();
export type MarketDataMessage = z.infer<typeof MarketDataMessageSchema>;

/**
 * A classified inbound message.
 */
export type InboundMessage =
  | { kind: "authentication"; message: AuthenticationMessage }
  | { kind: "subscription"; message: SubscriptionMessage }
  | { kind: "market_data"; message: MarketDataMessage }
  | { kind: "unknown"; type: string };

/**
 * Parse and classify a text frame.
 * @throws {StreamError} MalformedMessage if the frame is not JSON or fails validation
 */
export function parseStreamMessage(text: string): InboundMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw StreamError.malformedMessage(e instanceof Error ? e.message : "invalid JSON");
  }

  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw StreamError.malformedMessage("missing message type");
  }

  switch (envelope.data.type) {
    case "authentication":
      return { kind: "authentication", message: validate(AuthenticationMessageSchema, raw) };
    case "subscription":
      return { kind: "subscription", message: validate(SubscriptionMessageSchema, raw) };
    case "market_data":
      return { kind: "market_data", message: validate(MarketDataMessageSchema, raw) };
    default:
      return { kind: "unknown", type: envelope.data.type };
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join(".") || "message";
    throw StreamError.malformedMessage(`${path}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Key a market data message belongs to.
 */
export function marketDataKey(message: MarketDataMessage): SubscriptionKey {
  return subscriptionKey(message.data.symbol, message.data.exchange, message.mode);
}

// ============================================================================
// CLIENT EVENTS
// ============================================================================

/**
 * Events emitted by the streaming session.
 */
export type StreamEvent =
  | { type: "Connected"; url: string }
  | { type: "Authenticated" }
  | { type: "Disconnected"; code: number; reason: string }
  | { type: "SubscriptionAck"; key: SubscriptionKey; status: string }
  | { type: "Subscribed"; key: SubscriptionKey }
  | { type: "Unsubscribed"; key: SubscriptionKey }
  | { type: "MarketData"; key: SubscriptionKey; payload: MarketDataMessage }
  | { type: "Heartbeat"; at: Date }
  | { type: "Error"; error: StreamError };
