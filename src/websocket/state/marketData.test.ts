import { describe, it, expect, beforeEach } from "vitest";
import { MarketDataCache } from "./marketData";
import { subscriptionKey, type MarketDataMessage } from "../types";

const reliance = subscriptionKey("RELIANCE", "NSE", 1);
const infy = subscriptionKey("INFY", "NSE", 2);

function ltpMessage(ltp: number, topic?: string): MarketDataMessage {
  return {
    type: "market_data",
    mode: 1,
    topic,
    data: { symbol: "RELIANCE", exchange: "NSE", ltp },
  };
}

describe("MarketDataCache", () => {
  let cache: MarketDataCache;

  beforeEach(() => {
    cache = new MarketDataCache();
  });

  it("stores the latest payload per key", () => {
    cache.put(reliance, ltpMessage(2500.5));
    cache.put(reliance, ltpMessage(2501));

    expect(cache.get(reliance)?.data.ltp).toBe(2501);
    expect(cache.has(reliance)).toBe(true);
    expect(cache.has(infy)).toBe(false);
    expect(cache.size()).toBe(1);
    expect(cache.keys()).toEqual(["RELIANCE|NSE|1"]);
  });

  it("stores the payload under its topic", () => {
    const message = ltpMessage(2500.5, "RELIANCE.NSE.LTP");
    cache.put(reliance, message);
    expect(cache.getByTopic("RELIANCE.NSE.LTP")).toBe(message);
  });

  it("moves the alias when the topic changes", () => {
    cache.put(reliance, ltpMessage(2500, "old-topic"));
    cache.put(reliance, ltpMessage(2501, "new-topic"));
    expect(cache.getByTopic("old-topic")).toBeUndefined();
    expect(cache.getByTopic("new-topic")?.data.ltp).toBe(2501);
  });

  it("drops the alias when a later payload has no topic", () => {
    cache.put(reliance, ltpMessage(2500, "RELIANCE.NSE.LTP"));
    cache.put(reliance, ltpMessage(2501));
    expect(cache.getByTopic("RELIANCE.NSE.LTP")).toBeUndefined();
  });

  it("removes a key and its alias", () => {
    cache.put(reliance, ltpMessage(2500.5, "RELIANCE.NSE.LTP"));
    expect(cache.remove(reliance)).toBe(true);
    expect(cache.get(reliance)).toBeUndefined();
    expect(cache.getByTopic("RELIANCE.NSE.LTP")).toBeUndefined();
    expect(cache.remove(reliance)).toBe(false);
  });

  it("clears everything", () => {
    cache.put(reliance, ltpMessage(2500.5, "RELIANCE.NSE.LTP"));
    cache.clear();
    expect(cache.size()).toBe(0);
    expect(cache.getByTopic("RELIANCE.NSE.LTP")).toBeUndefined();
  });
});
