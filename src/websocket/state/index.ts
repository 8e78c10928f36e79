/**
 * Local state held by the streaming session.
 */

export { MarketDataCache } from "./marketData";
