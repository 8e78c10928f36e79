/**
 * Last-value market data cache.
 *
 * The dispatcher is the only writer. Each write swaps in a fully parsed
 * message, so pollers reading between frames see either the previous payload
 * or the new one.
 */

import { keyId, type MarketDataMessage, type SubscriptionKey } from "../types";

export class MarketDataCache {
  /** Latest message per key id */
  private byKey: Map<string, MarketDataMessage> = new Map();
  /** Same messages under the server's topic string */
  private byTopic: Map<string, MarketDataMessage> = new Map();
  /** Topic each key was last stored under */
  private topicByKey: Map<string, string> = new Map();

  /**
   * Store the latest message for a key, and under its topic if it has one.
   */
  put(key: SubscriptionKey, payload: MarketDataMessage): void {
    const id = keyId(key);
    this.byKey.set(id, payload);

    const previousTopic = this.topicByKey.get(id);
    if (previousTopic !== undefined && previousTopic !== payload.topic) {
      this.byTopic.delete(previousTopic);
      this.topicByKey.delete(id);
    }
    if (payload.topic !== undefined) {
      this.byTopic.set(payload.topic, payload);
      this.topicByKey.set(id, payload.topic);
    }
  }

  /**
   * Get the latest message for a key.
   */
  get(key: SubscriptionKey): MarketDataMessage | undefined {
    return this.byKey.get(keyId(key));
  }

  /**
   * Get the latest message stored under a topic.
   */
  getByTopic(topic: string): MarketDataMessage | undefined {
    return this.byTopic.get(topic);
  }

  /**
   * Check if a key has data.
   */
  has(key: SubscriptionKey): boolean {
    return this.byKey.has(keyId(key));
  }

  /**
   * Remove a key and its topic alias.
   */
  remove(key: SubscriptionKey): boolean {
    const id = keyId(key);
    const topic = this.topicByKey.get(id);
    if (topic !== undefined) {
      this.byTopic.delete(topic);
      this.topicByKey.delete(id);
    }
    return this.byKey.delete(id);
  }

  /**
   * Drop everything.
   */
  clear(): void {
    this.byKey.clear();
    this.byTopic.clear();
    this.topicByKey.clear();
  }

  /**
   * Number of keys with data.
   */
  size(): number {
    return this.byKey.size;
  }

  /**
   * Key ids with data.
   */
  keys(): string[] {
    return Array.from(this.byKey.keys());
  }
}
