/**
 * Projections of cached market data into spreadsheet-style cells and tables.
 */

import { z } from "zod";
import { keyId, subscriptionKey, type MarketDataMessage, type Mode } from "./types";

/**
 * A single cell value.
 */
export type Cell = string | number | boolean;

/**
 * Rows of cells.
 */
export type Table = Cell[][];

export const NOT_AVAILABLE = "N/A";
export const NO_DEPTH_DATA = "No depth data available";
export const FIELD_NOT_FOUND = "Field not found";
export const NO_ACTIVE_SUBSCRIPTIONS = "No active subscriptions";

export const DEPTH_COLUMNS = [
  "Bid Orders",
  "Bid Qty",
  "Bid Price",
  "",
  "Ask Price",
  "Ask Qty",
  "Ask Orders",
] as const;

// Missing or unparseable numbers in a ladder render as 0.
const numeric = z.coerce.number().catch(0);

const DepthLevelSchema = z.object({
  price: numeric,
  quantity: numeric,
  orders: numeric,
});

const DepthSchema = z.object({
  buy: z.array(DepthLevelSchema).catch([]),
  sell: z.array(DepthLevelSchema).catch([]),
});

export type DepthLevel = z.infer<typeof DepthLevelSchema>;

/**
 * Read a number from a JSON value. Numeric strings count.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

/**
 * Render any JSON value as cell text.
 */
export function cellText(value: unknown): string {
  if (value === undefined || value === null) return NOT_AVAILABLE;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function label(symbol: string, exchange: string): string {
  return `${symbol} (${exchange})`;
}

/**
 * Last traded price, or "N/A".
 */
export function ltpCell(payload: MarketDataMessage): Cell {
  return toNumber(payload.data.ltp) ?? NOT_AVAILABLE;
}

/**
 * Two-column table of every field in the payload, in the order received.
 */
export function quoteTable(symbol: string, exchange: string, payload: MarketDataMessage): Table {
  const rows: Table = [[label(symbol, exchange), "Value"]];
  for (const [name, value] of Object.entries(payload.data)) {
    rows.push([name, cellText(value)]);
  }
  return rows;
}

/**
 * Seven-column order book ladder:
 *
 * ```
 * SYM (EXCH) |         |           | LTP | 2500.5    |         |
 * Bid Orders | Bid Qty | Bid Price |     | Ask Price | Ask Qty | Ask Orders
 * ...one row per level, the shorter side padded with 0...
 * ```
 */
export function depthTable(
  symbol: string,
  exchange: string,
  payload: MarketDataMessage
): Table | string {
  const parsed = DepthSchema.safeParse(payload.data.depth);
  if (!parsed.success) {
    return NO_DEPTH_DATA;
  }

  const { buy, sell } = parsed.data;
  const ltp = toNumber(payload.data.ltp) ?? 0;
  const rows: Table = [
    [label(symbol, exchange), "", "", "LTP", ltp, "", ""],
    [...DEPTH_COLUMNS],
  ];

  const levels = Math.max(buy.length, sell.length);
  for (let i = 0; i < levels; i++) {
    const bid = buy[i];
    const ask = sell[i];
    rows.push([
      bid?.orders ?? 0,
      bid?.quantity ?? 0,
      bid?.price ?? 0,
      "",
      ask?.price ?? 0,
      ask?.quantity ?? 0,
      ask?.orders ?? 0,
    ]);
  }
  return rows;
}

/**
 * One field of the payload. Numeric values come back as numbers.
 */
export function fieldCell(payload: MarketDataMessage, field: string): Cell {
  const value: unknown = payload.data[field];
  if (value === undefined) {
    return FIELD_NOT_FOUND;
  }
  return toNumber(value) ?? cellText(value);
}

/**
 * Single-column listing of live subscriptions.
 */
export function subscriptionsTable(ids: string[]): Table {
  if (ids.length === 0) {
    return [[NO_ACTIVE_SUBSCRIPTIONS]];
  }
  return [["Active Subscriptions"], ...ids.map((id) => [id])];
}

/**
 * Inputs for the debug table.
 */
export interface DebugInfo {
  symbol: string;
  exchange: string;
  mode: Mode;
  isSubscribed: boolean;
  payload: MarketDataMessage | undefined;
  activeSubscriptions: string[];
}

/**
 * Two-column dump of what the session knows about one key.
 */
export function debugTable(info: DebugInfo): Table {
  const rows: Table = [
    ["Debug Information", "Value"],
    ["Symbol", info.symbol],
    ["Exchange", info.exchange],
    ["Mode", info.mode],
    ["Expected Key", keyId(subscriptionKey(info.symbol, info.exchange, info.mode))],
    ["Is Subscribed", info.isSubscribed],
    ["Has Data", info.payload !== undefined],
  ];

  if (info.payload) {
    rows.push(["Data Type", info.payload.type]);
    rows.push(["Data Mode", String(info.payload.mode)]);
    rows.push(["Data Topic", info.payload.topic ?? NOT_AVAILABLE]);
  }

  rows.push(["", ""]);
  rows.push(["Active Subscriptions:", ""]);
  for (const id of info.activeSubscriptions) {
    rows.push([id, ""]);
  }
  return rows;
}
