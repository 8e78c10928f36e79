/**
 * Streaming session for OpenAlgo market data.
 *
 * One session owns one socket, the subscription registry and the last-value
 * cache. Every public operation returns a status string or a payload, never
 * throws, so it can be handed straight to a polling host.
 *
 * @example
 * ```typescript
 * import { StreamSession } from "openalgo-stream";
 *
 * const session = new StreamSession({ apiKey: "your-api-key" });
 * await session.subscribe("RELIANCE", "NSE", 1);
 *
 * session.on((event) => {
 *   if (event.type === "MarketData") {
 *     console.log(event.payload.data.ltp);
 *   }
 * });
 *
 * // Pollers: first call subscribes, later calls read the cache
 * const value = await session.read("INFY", "NSE", 2);
 * ```
 */

import type { Logger } from "pino";
import { createChildLogger } from "../logger";
import { StreamError, errorMessage, errorStatus, toStreamError } from "./error";
import {
  Connection,
  type ConfirmationMode,
  type ConnectionConfig,
  type ConnectOutcome,
} from "./connection";
import { PendingRequests } from "./pending";
import { SubscriptionRegistry, type SubscriptionRecord } from "./subscriptions";
import { MarketDataCache } from "./state";
import { MessageHandler } from "./handlers";
import { AutoSubscribeFacade, sentinelText, type ReadResult } from "./facade";
import {
  MODE,
  createSubscribeRequest,
  createUnsubscribeRequest,
  isMode,
  keyId,
  subscriptionKey,
  toSubscriptionKey,
  type MarketDataMessage,
  type StreamEvent,
  type SubscriptionKey,
} from "./types";
import {
  DEFAULT_DEPTH_LEVEL,
  DEFAULT_WS_URL,
  SUBSCRIPTION_TIMEOUT_MS,
} from "./constants";

/**
 * Session configuration.
 */
export interface StreamSessionConfig extends ConnectionConfig {
  /** Server URL (default: ws://127.0.0.1:8765) */
  url?: string;
  /** Confirmed mode: how long to wait for a subscription ack (ms) */
  subscriptionTimeoutMs?: number;
  /** Re-send subscribe requests for live records after a reconnect (default: true) */
  autoResubscribe?: boolean;
  /** Parent logger; components log through children of it */
  logger?: Logger;
}

/**
 * Event callback type.
 */
export type EventCallback = (event: StreamEvent) => void;

/**
 * A subscribe request in flight.
 */
interface SubscriptionAttempt {
  /** Settles when the request is on the wire */
  sent: Promise<void>;
  /** Settles when the record exists (ack in confirmed mode, send in assumed mode) */
  acknowledged: Promise<SubscriptionRecord>;
}

export class StreamSession {
  private confirmation: ConfirmationMode;
  private subscriptionTimeoutMs: number;
  private autoResubscribe: boolean;
  private connection: Connection;
  private registry: SubscriptionRegistry = new SubscriptionRegistry();
  private cache: MarketDataCache = new MarketDataCache();
  private handler: MessageHandler;
  private facade: AutoSubscribeFacade;
  private pendingSubscriptions: PendingRequests<void> = new PendingRequests();
  /** Depth level requested by each pending subscribe (key id -> level) */
  private pendingDepthLevels: Map<string, number | undefined> = new Map();
  /** Assumed mode: subscribe sends still on the wire (key id -> attempt) */
  private sendingSubscriptions: Map<string, SubscriptionAttempt> = new Map();
  /** Keys confirmed by the frame being dispatched */
  private confirmedKeys: SubscriptionKey[] = [];
  private connecting: Promise<ConnectOutcome> | null = null;
  private eventCallbacks: EventCallback[] = [];
  private log: Logger;

  constructor(config: StreamSessionConfig = {}) {
    const parent = config.logger;
    this.log = parent?.child({ component: "session" }) ?? createChildLogger({ component: "session" });
    this.confirmation = config.confirmation ?? "confirmed";
    this.subscriptionTimeoutMs = config.subscriptionTimeoutMs ?? SUBSCRIPTION_TIMEOUT_MS;
    this.autoResubscribe = config.autoResubscribe ?? true;

    this.connection = new Connection(
      {
        onMessage: (text) => this.dispatch(text),
        onClose: (code, reason) => this.handleDisconnect(code, reason),
      },
      config.url ?? DEFAULT_WS_URL,
      config,
      parent?.child({ component: "connection" })
    );

    this.handler = new MessageHandler(
      {
        registry: this.registry,
        cache: this.cache,
        sendText: (text) => this.connection.sendText(text),
        onAuthentication: (success, reason) =>
          this.connection.handleAuthenticationResult(success, reason),
        onSubscriptionAck: (key, success, reason) =>
          this.handleSubscriptionAck(key, success, reason),
      },
      parent?.child({ component: "dispatcher" })
    );

    this.facade = new AutoSubscribeFacade(
      {
        wasManuallyUnsubscribed: (key) => this.registry.wasManuallyUnsubscribed(key),
        isSubscribed: (key) => this.registry.isSubscribed(key),
        getMarketData: (key) => this.cache.get(key),
        requestSubscription: (key, depthLevel) => this.requestSubscription(key, depthLevel),
      },
      parent?.child({ component: "facade" })
    );
  }

  /**
   * Create a session and connect it.
   * @throws {StreamError} if the socket cannot be opened or the API key is refused
   */
  static async open(config?: StreamSessionConfig): Promise<StreamSession> {
    const session = new StreamSession(config);
    await session.openConnection();
    return session;
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  /**
   * Connect and authenticate.
   *
   * Returns "Connected and authenticated", "Already connected" or
   * "Error: <reason>".
   */
  async connect(url?: string): Promise<string> {
    try {
      const outcome = await this.openConnection(url);
      return outcome === "AlreadyConnected" ? "Already connected" : "Connected and authenticated";
    } catch (e) {
      this.log.warn({ err: e }, "Connect failed");
      return errorStatus(e);
    }
  }

  /**
   * Re-run the API-key handshake on the open socket, e.g. after a timed-out
   * confirmation.
   */
  async authenticate(): Promise<string> {
    try {
      await this.connection.authenticate();
      return "Authenticated";
    } catch (e) {
      this.log.warn({ err: e }, "Authentication failed");
      return errorStatus(e);
    }
  }

  /**
   * Close the socket. Subscriptions and cached data are kept, and come back
   * with the next connect.
   */
  async close(): Promise<void> {
    await this.connection.close();
  }

  /**
   * Current socket state.
   */
  getConnectionState(): string {
    return this.connection.getState();
  }

  /**
   * Check if the API key was accepted on the current socket.
   */
  isAuthenticated(): boolean {
    return this.connection.isAuthenticated();
  }

  /**
   * Get the WebSocket URL.
   */
  getUrl(): string {
    return this.connection.getUrl();
  }

  /**
   * Change the URL used by the next connect.
   */
  setUrl(url: string): void {
    this.connection.setUrl(url);
  }

  // ============================================================================
  // SUBSCRIBE METHODS
  // ============================================================================

  /**
   * Subscribe to a feed, connecting first if needed.
   *
   * In confirmed mode this waits for the server's ack. An explicit subscribe
   * lifts a previous manual unsubscribe.
   */
  async subscribe(
    symbol: string,
    exchange: string,
    mode: number,
    depthLevel?: number
  ): Promise<string> {
    try {
      const key = toSubscriptionKey(symbol, exchange, mode);
      await this.prepareSubscription(key);
      const { sent, acknowledged } = this.startSubscription(key, depthLevel);
      await Promise.all([sent, acknowledged]);
      return `Subscribed: ${symbol} (${exchange}) - Mode ${mode}`;
    } catch (e) {
      this.log.warn({ symbol, exchange, mode, err: e }, "Subscribe failed");
      return errorStatus(e);
    }
  }

  /**
   * Unsubscribe from a feed. The key is marked so pollers do not
   * resubscribe it.
   */
  async unsubscribe(symbol: string, exchange: string, mode: number): Promise<string> {
    try {
      const key = toSubscriptionKey(symbol, exchange, mode);
      await this.unsubscribeKey(key);
      return `Unsubscribed: ${symbol} (${exchange}) - Mode ${mode}`;
    } catch (e) {
      this.log.warn({ symbol, exchange, mode, err: e }, "Unsubscribe failed");
      return errorStatus(e);
    }
  }

  /**
   * Unsubscribe from everything and reset: markers and cache are cleared,
   * so pollers may subscribe again.
   */
  async unsubscribeAll(): Promise<string> {
    const records = this.registry.activeRecords();
    let failed = 0;
    for (const record of records) {
      try {
        await this.unsubscribeKey(record.key);
      } catch (e) {
        failed++;
        this.log.warn({ key: keyId(record.key), err: e }, "Unsubscribe request failed");
      }
    }

    this.pendingSubscriptions.rejectAll(
      StreamError.subscriptionRejected("all keys", "cancelled by unsubscribe all")
    );
    this.pendingDepthLevels.clear();
    this.sendingSubscriptions.clear();
    this.registry.clearManualUnsubscribeFlags();
    this.cache.clear();

    if (records.length === 0) {
      return "No active subscriptions";
    }
    const status = `Unsubscribed from ${records.length} subscription(s)`;
    return failed > 0 ? `${status}, ${failed} request(s) failed to send` : status;
  }

  // ============================================================================
  // READ METHODS
  // ============================================================================

  /**
   * Poll a feed: the payload if one is cached, otherwise a placeholder
   * string ("Subscribing...", "Waiting for data...", "Unsubscribed" or
   * "Error: <reason>"). The first read of a key subscribes it.
   */
  async read(
    symbol: string,
    exchange: string,
    mode: number,
    depthLevel?: number
  ): Promise<MarketDataMessage | string> {
    const result = await this.readResult(symbol, exchange, mode, depthLevel);
    return result.type === "Data" ? result.payload : sentinelText(result);
  }

  /**
   * Poll a feed and get the structured outcome.
   */
  async readResult(
    symbol: string,
    exchange: string,
    mode: number,
    depthLevel?: number
  ): Promise<ReadResult> {
    let key: SubscriptionKey;
    try {
      key = toSubscriptionKey(symbol, exchange, mode);
    } catch (e) {
      return { type: "Error", message: errorMessage(e) };
    }
    return this.facade.read(key, depthLevel);
  }

  /**
   * Latest cached payload for a feed, without subscribing.
   */
  getMarketData(symbol: string, exchange: string, mode: number): MarketDataMessage | undefined {
    const key = this.lookupKey(symbol, exchange, mode);
    return key ? this.cache.get(key) : undefined;
  }

  /**
   * Latest cached payload under the server's topic string.
   */
  getMarketDataByTopic(topic: string): MarketDataMessage | undefined {
    return this.cache.getByTopic(topic);
  }

  /**
   * Key ids of live subscriptions ("SYMBOL|EXCHANGE|MODE"), in subscribe order.
   */
  listActiveSubscriptions(): string[] {
    return this.registry.listActive();
  }

  /**
   * Live subscription records, in subscribe order.
   */
  activeSubscriptions(): SubscriptionRecord[] {
    return this.registry.activeRecords();
  }

  /**
   * Check if a feed is live.
   */
  isSubscribed(symbol: string, exchange: string, mode: number): boolean {
    const key = this.lookupKey(symbol, exchange, mode);
    return key ? this.registry.isSubscribed(key) : false;
  }

  /**
   * Check if a feed was explicitly unsubscribed.
   */
  wasManuallyUnsubscribed(symbol: string, exchange: string, mode: number): boolean {
    const key = this.lookupKey(symbol, exchange, mode);
    return key ? this.registry.wasManuallyUnsubscribed(key) : false;
  }

  /**
   * Time the server last pinged.
   */
  lastHeartbeatAt(): Date | undefined {
    return this.handler.lastHeartbeatAt();
  }

  /**
   * Number of pings answered.
   */
  heartbeatCount(): number {
    return this.handler.heartbeatCount();
  }

  // ============================================================================
  // EVENT HANDLING
  // ============================================================================

  /**
   * Register an event callback.
   */
  on(callback: EventCallback): void {
    this.eventCallbacks.push(callback);
  }

  /**
   * Remove an event callback.
   */
  off(callback: EventCallback): void {
    const index = this.eventCallbacks.indexOf(callback);
    if (index !== -1) {
      this.eventCallbacks.splice(index, 1);
    }
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  /**
   * Connect, or fail if a connect is already running.
   */
  private openConnection(url?: string): Promise<ConnectOutcome> {
    if (this.connecting) {
      return Promise.reject(StreamError.connectInProgress());
    }

    const attempt = this.connection.connect(url).then(async (outcome) => {
      if (outcome === "Connected") {
        this.emitEvent({ type: "Connected", url: this.connection.getUrl() });
        await this.resubscribeActive();
      }
      return outcome;
    });
    const connecting = attempt.finally(() => {
      this.connecting = null;
    });
    this.connecting = connecting;
    return connecting;
  }

  /**
   * Connect implicitly, joining a connect that is already running.
   */
  private async ensureConnected(): Promise<void> {
    if (this.connecting) {
      await this.connecting;
      return;
    }
    if (this.connection.getState() === "Open") {
      return;
    }
    await this.openConnection();
  }

  /**
   * Re-send subscribe requests for records that survived a disconnect.
   */
  private async resubscribeActive(): Promise<void> {
    if (!this.autoResubscribe || !this.registry.hasSubscriptions()) {
      return;
    }
    const records = this.registry.activeRecords();
    this.log.info({ count: records.length }, "Resubscribing");
    for (const record of records) {
      try {
        await this.connection.send(createSubscribeRequest(record.key, record.depthLevel));
      } catch (e) {
        this.log.warn({ key: keyId(record.key), err: e }, "Resubscribe failed");
      }
    }
  }

  /**
   * Connect if needed and check the socket can take a subscribe.
   */
  private async prepareSubscription(key: SubscriptionKey): Promise<void> {
    await this.ensureConnected();
    if (!this.connection.isAuthenticated()) {
      throw StreamError.notAuthenticated();
    }
    this.registry.clearManualUnsubscribe(key);
  }

  /**
   * Send a subscribe request. Concurrent requests for the same key share
   * one ack and only the first goes on the wire.
   */
  private startSubscription(key: SubscriptionKey, depthLevel?: number): SubscriptionAttempt {
    const level = key.mode === MODE.Depth ? depthLevel ?? DEFAULT_DEPTH_LEVEL : undefined;
    const request = createSubscribeRequest(key, level);

    const id = keyId(key);

    if (this.confirmation === "assumed") {
      const inFlight = this.sendingSubscriptions.get(id);
      if (inFlight) {
        return inFlight;
      }
      const sent = this.connection.send(request);
      const attempt: SubscriptionAttempt = {
        sent,
        acknowledged: sent.then(() => {
          if (this.sendingSubscriptions.get(id) !== attempt) {
            throw StreamError.subscriptionRejected(id, "cancelled by unsubscribe");
          }
          this.sendingSubscriptions.delete(id);
          return this.addRecord(key, level);
        }),
      };
      this.sendingSubscriptions.set(id, attempt);
      void sent.catch(() => {
        if (this.sendingSubscriptions.get(id) === attempt) {
          this.sendingSubscriptions.delete(id);
        }
      });
      return attempt;
    }

    const timeoutMs = this.subscriptionTimeoutMs;
    const joining = this.pendingSubscriptions.has(id);
    const ack = this.pendingSubscriptions.register(id, timeoutMs, () =>
      StreamError.subscriptionTimeout(id, timeoutMs)
    );
    if (!joining) {
      this.pendingDepthLevels.set(id, level);
      const forget = (): void => {
        if (!this.pendingSubscriptions.has(id)) {
          this.pendingDepthLevels.delete(id);
        }
      };
      void ack.then(forget, forget);
    }
    // The ack handler creates the record before it resolves the pending entry.
    const acknowledged = ack.then(() => this.registry.get(key) ?? this.addRecord(key, level));
    const sent = joining
      ? Promise.resolve()
      : this.connection.send(request).catch((e: unknown) => {
          const error = toStreamError(e);
          this.pendingSubscriptions.reject(id, error);
          throw error;
        });
    return { sent, acknowledged };
  }

  /**
   * Subscribe on behalf of a poller. Resolves once the request is sent; the
   * outcome of the ack is reported through events.
   */
  private async requestSubscription(key: SubscriptionKey, depthLevel?: number): Promise<void> {
    const id = keyId(key);
    if (this.pendingSubscriptions.has(id) || this.sendingSubscriptions.has(id)) {
      return;
    }
    await this.prepareSubscription(key);
    const { sent, acknowledged } = this.startSubscription(key, depthLevel);
    void acknowledged.then(
      (record) => {
        this.log.debug({ key: keyId(record.key) }, "Auto-subscribe confirmed");
      },
      (e: unknown) => {
        this.log.warn({ key: keyId(key), err: e }, "Auto-subscribe not confirmed");
        this.emitEvent({ type: "Error", error: toStreamError(e) });
      }
    );
    await sent;
  }

  private addRecord(key: SubscriptionKey, depthLevel?: number): SubscriptionRecord {
    const record = this.registry.add(key, depthLevel);
    this.log.info({ key: keyId(key) }, "Subscribed");
    this.emitEvent({ type: "Subscribed", key });
    return record;
  }

  /**
   * Create the record for a positive ack. The Subscribed event follows the
   * frame's own events.
   */
  private confirmRecord(key: SubscriptionKey, depthLevel?: number): void {
    if (this.registry.isSubscribed(key)) {
      return;
    }
    this.registry.add(key, depthLevel);
    this.log.info({ key: keyId(key) }, "Subscribed");
    this.confirmedKeys.push(key);
  }

  private async unsubscribeKey(key: SubscriptionKey): Promise<void> {
    const id = keyId(key);
    this.pendingSubscriptions.reject(
      id,
      StreamError.subscriptionRejected(id, "cancelled by unsubscribe")
    );
    this.sendingSubscriptions.delete(id);
    this.registry.remove(key);
    this.cache.remove(key);
    this.registry.markManuallyUnsubscribed(key);
    this.log.info({ key: id }, "Unsubscribed");
    this.emitEvent({ type: "Unsubscribed", key });

    // Local state is authoritative; the server is only told when reachable.
    if (this.connection.getState() === "Open") {
      await this.connection.send(createUnsubscribeRequest(key));
    }
  }

  private handleSubscriptionAck(key: SubscriptionKey, success: boolean, reason: string): void {
    const id = keyId(key);
    if (success) {
      if (!this.pendingSubscriptions.has(id)) {
        this.log.debug({ key: id }, "Subscription ack with nothing pending");
        return;
      }
      // Data sent right behind the ack must find the record.
      this.confirmRecord(key, this.pendingDepthLevels.get(id));
      this.pendingDepthLevels.delete(id);
      this.pendingSubscriptions.resolve(id, undefined);
      return;
    }
    if (!this.pendingSubscriptions.reject(id, StreamError.subscriptionRejected(id, reason))) {
      this.log.warn({ key: id, reason }, "Subscription rejected with nothing pending");
    }
  }

  private dispatch(text: string): void {
    const events = this.handler.handleMessage(text);
    const confirmed = this.confirmedKeys.splice(0);
    for (const event of events) {
      this.emitEvent(event);
    }
    for (const key of confirmed) {
      this.emitEvent({ type: "Subscribed", key });
    }
  }

  private handleDisconnect(code: number, reason: string): void {
    this.pendingSubscriptions.rejectAll(StreamError.transportClosed(code, reason));
    this.emitEvent({ type: "Disconnected", code, reason });
  }

  /**
   * Key for a lookup; invalid input matches nothing.
   */
  private lookupKey(symbol: string, exchange: string, mode: number): SubscriptionKey | undefined {
    if (!symbol || !exchange || !isMode(mode)) {
      return undefined;
    }
    return subscriptionKey(symbol, exchange, mode);
  }

  /**
   * Emit an event to all callbacks.
   */
  private emitEvent(event: StreamEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (e) {
        this.log.error({ err: e }, "Event callback error");
      }
    }
  }
}
