/**
 * Auto-subscribe read path for polling callers.
 *
 * Pollers are re-invoked on every recalculation and never wait for data:
 * the first read of a key fires a subscribe and reports `Subscribing`, later
 * reads return whatever the cache holds.
 */

import type { Logger } from "pino";
import { createChildLogger } from "../logger";
import { errorMessage } from "./error";
import { keyId, type MarketDataMessage, type SubscriptionKey } from "./types";
import { SENTINEL } from "./constants";

/**
 * Outcome of one poll.
 */
export type ReadResult =
  | { type: "Data"; payload: MarketDataMessage }
  | { type: "Unsubscribed" }
  | { type: "Subscribing" }
  | { type: "WaitingForData" }
  | { type: "Error"; message: string };

/**
 * What the façade reads from and subscribes through.
 */
export interface SubscriptionSource {
  wasManuallyUnsubscribed(key: SubscriptionKey): boolean;
  isSubscribed(key: SubscriptionKey): boolean;
  getMarketData(key: SubscriptionKey): MarketDataMessage | undefined;
  /** Resolves once the subscribe request is on the wire, not when it is acked */
  requestSubscription(key: SubscriptionKey, depthLevel?: number): Promise<void>;
}

export class AutoSubscribeFacade {
  private source: SubscriptionSource;
  private log: Logger;

  constructor(
    source: SubscriptionSource,
    log: Logger = createChildLogger({ component: "facade" })
  ) {
    this.source = source;
    this.log = log;
  }

  /**
   * Read the latest data for a key, subscribing on first read.
   */
  async read(key: SubscriptionKey, depthLevel?: number): Promise<ReadResult> {
    if (this.source.wasManuallyUnsubscribed(key)) {
      return { type: "Unsubscribed" };
    }

    if (!this.source.isSubscribed(key)) {
      try {
        await this.source.requestSubscription(key, depthLevel);
      } catch (e) {
        this.log.warn({ key: keyId(key), err: e }, "Auto-subscribe failed");
        return { type: "Error", message: errorMessage(e) };
      }
      return { type: "Subscribing" };
    }

    const payload = this.source.getMarketData(key);
    if (!payload) {
      return { type: "WaitingForData" };
    }
    return { type: "Data", payload };
  }
}

/**
 * Placeholder text for a result that carries no data.
 */
export function sentinelText(
  result: Exclude<ReadResult, { type: "Data" }>
): string {
  switch (result.type) {
    case "Unsubscribed":
      return SENTINEL.Unsubscribed;
    case "Subscribing":
      return SENTINEL.Subscribing;
    case "WaitingForData":
      return SENTINEL.WaitingForData;
    case "Error":
      return `Error: ${result.message}`;
  }
}
