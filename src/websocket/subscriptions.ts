/**
 * Subscription bookkeeping for the streaming session.
 *
 * Tracks which keys are live and which were explicitly unsubscribed by a
 * caller. A manual-unsubscribe marker suppresses auto-subscribe for its key
 * until an explicit subscribe or a full reset clears it.
 */

import { keyId, type SubscriptionKey } from "./types";

/**
 * A live subscription.
 */
export interface SubscriptionRecord {
  readonly key: SubscriptionKey;
  /** Requested order book depth (mode 3 only) */
  readonly depthLevel?: number;
  readonly subscribedAt: Date;
}

/**
 * Authoritative record of live subscriptions and manual unsubscribes.
 */
export class SubscriptionRegistry {
  /** Live subscriptions (key id -> record), in subscribe order */
  private records: Map<string, SubscriptionRecord> = new Map();
  /** Keys a caller unsubscribed explicitly (key id -> when) */
  private manuallyUnsubscribed: Map<string, Date> = new Map();

  /**
   * Add or replace the record for a key.
   */
  add(key: SubscriptionKey, depthLevel?: number, at: Date = new Date()): SubscriptionRecord {
    const record: SubscriptionRecord =
      depthLevel === undefined
        ? { key, subscribedAt: at }
        : { key, depthLevel, subscribedAt: at };
    const id = keyId(key);
    // Re-adding keeps the original position in the listing.
    this.records.set(id, record);
    return record;
  }

  /**
   * Remove the record for a key.
   */
  remove(key: SubscriptionKey): boolean {
    return this.records.delete(keyId(key));
  }

  /**
   * Get the record for a key.
   */
  get(key: SubscriptionKey): SubscriptionRecord | undefined {
    return this.records.get(keyId(key));
  }

  /**
   * Check if a key is live.
   */
  isSubscribed(key: SubscriptionKey): boolean {
    return this.records.has(keyId(key));
  }

  /**
   * Suppress auto-subscribe for a key.
   */
  markManuallyUnsubscribed(key: SubscriptionKey, at: Date = new Date()): void {
    this.manuallyUnsubscribed.set(keyId(key), at);
  }

  /**
   * Lift the auto-subscribe suppression for a key.
   */
  clearManualUnsubscribe(key: SubscriptionKey): boolean {
    return this.manuallyUnsubscribed.delete(keyId(key));
  }

  /**
   * Check if a key was explicitly unsubscribed.
   */
  wasManuallyUnsubscribed(key: SubscriptionKey): boolean {
    return this.manuallyUnsubscribed.has(keyId(key));
  }

  /**
   * When a key was explicitly unsubscribed.
   */
  manuallyUnsubscribedAt(key: SubscriptionKey): Date | undefined {
    return this.manuallyUnsubscribed.get(keyId(key));
  }

  /**
   * Clear every manual-unsubscribe marker.
   */
  clearManualUnsubscribeFlags(): void {
    this.manuallyUnsubscribed.clear();
  }

  /**
   * Key ids of live subscriptions, in subscribe order.
   */
  listActive(): string[] {
    return Array.from(this.records.keys());
  }

  /**
   * Live subscription records, in subscribe order.
   */
  activeRecords(): SubscriptionRecord[] {
    return Array.from(this.records.values());
  }

  /**
   * Get count of live subscriptions.
   */
  subscriptionCount(): number {
    return this.records.size;
  }

  /**
   * Check if there are any live subscriptions.
   */
  hasSubscriptions(): boolean {
    return this.records.size > 0;
  }

  /**
   * Drop every record and marker.
   */
  clear(): void {
    this.records.clear();
    this.manuallyUnsubscribed.clear();
  }
}
