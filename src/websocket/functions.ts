/**
 * Host-facing functions over a streaming session.
 *
 * Each function returns a cell or a table and never throws, so a spreadsheet
 * or dashboard can call it on every recalculation. Reads subscribe on first
 * use and report placeholder text until data arrives.
 */

import { errorMessage } from "./error";
import { sentinelText } from "./facade";
import { MODE, toSubscriptionKey } from "./types";
import type { StreamSession } from "./session";
import {
  debugTable,
  depthTable,
  fieldCell,
  ltpCell,
  quoteTable,
  subscriptionsTable,
  type Cell,
  type Table,
} from "./views";

export class StreamFunctions {
  private session: StreamSession;

  constructor(session: StreamSession) {
    this.session = session;
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  connect(url?: string): Promise<string> {
    return this.session.connect(url);
  }

  status(): string {
    return this.session.getConnectionState();
  }

  // ============================================================================
  // SUBSCRIPTIONS
  // ============================================================================

  subscribe(symbol: string, exchange: string, mode: number, depthLevel?: number): Promise<string> {
    return this.session.subscribe(symbol, exchange, mode, depthLevel);
  }

  unsubscribe(symbol: string, exchange: string, mode: number): Promise<string> {
    return this.session.unsubscribe(symbol, exchange, mode);
  }

  unsubscribeLtp(symbol: string, exchange: string): Promise<string> {
    return this.session.unsubscribe(symbol, exchange, MODE.LTP);
  }

  unsubscribeQuote(symbol: string, exchange: string): Promise<string> {
    return this.session.unsubscribe(symbol, exchange, MODE.Quote);
  }

  unsubscribeDepth(symbol: string, exchange: string): Promise<string> {
    return this.session.unsubscribe(symbol, exchange, MODE.Depth);
  }

  unsubscribeAll(): Promise<string> {
    return this.session.unsubscribeAll();
  }

  subscriptions(): Table {
    return subscriptionsTable(this.session.listActiveSubscriptions());
  }

  // ============================================================================
  // READS
  // ============================================================================

  /**
   * Last traded price (mode 1).
   */
  async ltp(symbol: string, exchange: string): Promise<Cell> {
    const result = await this.session.readResult(symbol, exchange, MODE.LTP);
    return result.type === "Data" ? ltpCell(result.payload) : sentinelText(result);
  }

  /**
   * Field/value table of the quote (mode 2).
   */
  async quote(symbol: string, exchange: string): Promise<Table> {
    const result = await this.session.readResult(symbol, exchange, MODE.Quote);
    if (result.type !== "Data") {
      return [[sentinelText(result)]];
    }
    return quoteTable(symbol, exchange, result.payload);
  }

  /**
   * Order book ladder (mode 3).
   */
  async depth(symbol: string, exchange: string, depthLevel?: number): Promise<Table> {
    const result = await this.session.readResult(symbol, exchange, MODE.Depth, depthLevel);
    if (result.type !== "Data") {
      return [[sentinelText(result)]];
    }
    const table = depthTable(symbol, exchange, result.payload);
    return typeof table === "string" ? [[table]] : table;
  }

  /**
   * One field of the payload for a mode (default: quote).
   */
  async field(
    symbol: string,
    exchange: string,
    field: string,
    mode: number = MODE.Quote
  ): Promise<Cell> {
    const result = await this.session.readResult(symbol, exchange, mode);
    return result.type === "Data" ? fieldCell(result.payload, field) : sentinelText(result);
  }

  /**
   * Subscription and cache state for one key.
   */
  debug(symbol: string, exchange: string, mode: number): Table {
    try {
      const key = toSubscriptionKey(symbol, exchange, mode);
      return debugTable({
        symbol: key.symbol,
        exchange: key.exchange,
        mode: key.mode,
        isSubscribed: this.session.isSubscribed(symbol, exchange, mode),
        payload: this.session.getMarketData(symbol, exchange, mode),
        activeSubscriptions: this.session.listActiveSubscriptions(),
      });
    } catch (e) {
      return [["Error", errorMessage(e)]];
    }
  }
}
