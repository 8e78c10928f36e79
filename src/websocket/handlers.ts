/**
 * Inbound dispatcher.
 *
 * Classifies every frame read from the socket and routes it to the
 * registry, the cache or a pending completion, returning the events the
 * session should emit.
 */

import type { Logger } from "pino";
import { createChildLogger } from "../logger";
import { StreamError, errorMessage } from "./error";
import type { SubscriptionRegistry } from "./subscriptions";
import type { MarketDataCache } from "./state";
import {
  keyId,
  marketDataKey,
  parseStreamMessage,
  subscriptionKey,
  type AuthenticationMessage,
  type InboundMessage,
  type MarketDataMessage,
  type SubscriptionKey,
  type SubscriptionMessage,
  type StreamEvent,
} from "./types";
import { HEARTBEAT_PING, HEARTBEAT_PONG } from "./constants";

const SUCCESS_STATUS = "success";

/**
 * What the dispatcher needs from the rest of the session.
 */
export interface DispatchContext {
  registry: SubscriptionRegistry;
  cache: MarketDataCache;
  /** Reply on the socket (heartbeats) */
  sendText(text: string): Promise<void>;
  /** Authentication result arrived */
  onAuthentication(success: boolean, reason: string): void;
  /** Subscription ack arrived */
  onSubscriptionAck(key: SubscriptionKey, success: boolean, reason: string): void;
}

/**
 * Handles incoming WebSocket messages.
 */
export class MessageHandler {
  private context: DispatchContext;
  private log: Logger;
  private lastHeartbeat: Date | undefined;
  private heartbeats = 0;

  constructor(
    context: DispatchContext,
    log: Logger = createChildLogger({ component: "dispatcher" })
  ) {
    this.context = context;
    this.log = log;
  }

  /**
   * Handle an incoming frame and return events.
   */
  handleMessage(text: string): StreamEvent[] {
    if (text.trim().toLowerCase() === HEARTBEAT_PING) {
      return this.handleHeartbeat();
    }

    let msg: InboundMessage;
    try {
      msg = parseStreamMessage(text);
    } catch (e) {
      const error =
        e instanceof StreamError ? e : StreamError.malformedMessage(errorMessage(e));
      this.log.warn({ err: error }, "Dropping malformed message");
      return [{ type: "Error", error }];
    }

    switch (msg.kind) {
      case "authentication":
        return this.handleAuthentication(msg.message);
      case "subscription":
        return this.handleSubscription(msg.message);
      case "market_data":
        return this.handleMarketData(msg.message);
      case "unknown":
        this.log.debug({ type: msg.type }, "Ignoring unknown message type");
        return [];
    }
  }

  /**
   * Time the last ping was answered.
   */
  lastHeartbeatAt(): Date | undefined {
    return this.lastHeartbeat;
  }

  /**
   * Number of pings answered.
   */
  heartbeatCount(): number {
    return this.heartbeats;
  }

  /**
   * Answer a ping with a pong.
   */
  private handleHeartbeat(): StreamEvent[] {
    const at = new Date();
    this.lastHeartbeat = at;
    this.heartbeats++;
    this.context.sendText(HEARTBEAT_PONG).catch((e: unknown) => {
      this.log.warn({ err: e }, "Failed to answer heartbeat");
    });
    this.log.debug("Heartbeat answered");
    return [{ type: "Heartbeat", at }];
  }

  /**
   * Handle the server's answer to the authenticate message.
   */
  private handleAuthentication(data: AuthenticationMessage): StreamEvent[] {
    const success = data.status === SUCCESS_STATUS;
    const reason = data.message ?? data.status;
    this.context.onAuthentication(success, reason);
    if (success) {
      return [{ type: "Authenticated" }];
    }
    return [{ type: "Error", error: StreamError.authenticationRejected(reason) }];
  }

  /**
   * Handle a subscription ack.
   */
  private handleSubscription(data: SubscriptionMessage): StreamEvent[] {
    const key = subscriptionKey(data.symbol, data.exchange, data.mode);
    const success = data.status === SUCCESS_STATUS;
    this.context.onSubscriptionAck(key, success, data.message ?? data.status);
    return [{ type: "SubscriptionAck", key, status: data.status }];
  }

  /**
   * Handle a market data frame. Data for keys without a live record is
   * dropped so an unsubscribed key cannot come back through the cache.
   */
  private handleMarketData(data: MarketDataMessage): StreamEvent[] {
    const key = marketDataKey(data);
    if (!this.context.registry.isSubscribed(key)) {
      this.log.warn({ key: keyId(key) }, "Discarding market data for inactive subscription");
      return [];
    }

    this.context.cache.put(key, data);
    return [{ type: "MarketData", key, payload: data }];
  }
}
