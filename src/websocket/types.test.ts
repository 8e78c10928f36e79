import { describe, it, expect } from "vitest";
import {
  MODE,
  isMode,
  modeName,
  subscriptionKey,
  toSubscriptionKey,
  keyId,
  parseKeyId,
  createAuthenticateRequest,
  createSubscribeRequest,
  createUnsubscribeRequest,
  parseStreamMessage,
  marketDataKey,
} from "./types";
import { StreamError } from "./error";

function captureError(fn: () => unknown): StreamError {
  try {
    fn();
  } catch (e) {
    if (e instanceof StreamError) return e;
    throw e;
  }
  throw new Error("expected a StreamError");
}

describe("stream types", () => {
  describe("modes", () => {
    it("accepts 1, 2 and 3 only", () => {
      expect(isMode(1)).toBe(true);
      expect(isMode(2)).toBe(true);
      expect(isMode(3)).toBe(true);
      expect(isMode(0)).toBe(false);
      expect(isMode(4)).toBe(false);
      expect(isMode(1.5)).toBe(false);
    });

    it("names modes", () => {
      expect(modeName(MODE.LTP)).toBe("LTP");
      expect(modeName(MODE.Quote)).toBe("Quote");
      expect(modeName(MODE.Depth)).toBe("Depth");
    });
  });

  describe("subscription keys", () => {
    it("creates frozen keys", () => {
      const key = subscriptionKey("RELIANCE", "NSE", 1);
      expect(Object.isFrozen(key)).toBe(true);
      expect(key).toEqual({ symbol: "RELIANCE", exchange: "NSE", mode: 1 });
    });

    it("formats and parses key ids", () => {
      const key = subscriptionKey("NIFTY24DECFUT", "NFO", 3);
      expect(keyId(key)).toBe("NIFTY24DECFUT|NFO|3");
      expect(parseKeyId("NIFTY24DECFUT|NFO|3")).toEqual(key);
    });

    it("rejects malformed key ids", () => {
      expect(parseKeyId("RELIANCE|NSE")).toBeUndefined();
      expect(parseKeyId("RELIANCE|NSE|9")).toBeUndefined();
      expect(parseKeyId("|NSE|1")).toBeUndefined();
    });

    it("keeps keys case-sensitive", () => {
      expect(keyId(subscriptionKey("reliance", "NSE", 1))).not.toBe(
        keyId(subscriptionKey("RELIANCE", "NSE", 1))
      );
    });

    it("validates caller input", () => {
      expect(captureError(() => toSubscriptionKey("", "NSE", 1)).message).toBe(
        "Symbol and Exchange are required"
      );
      expect(captureError(() => toSubscriptionKey("RELIANCE", "  ", 1)).message).toBe(
        "Symbol and Exchange are required"
      );
      const err = captureError(() => toSubscriptionKey("RELIANCE", "NSE", 4));
      expect(err.variant).toBe("InvalidArgument");
      expect(err.message).toBe("Mode must be 1 (LTP), 2 (Quote), or 3 (Depth)");
    });
  });

  describe("request helpers", () => {
    it("creates authenticate request", () => {
      expect(createAuthenticateRequest("test-api-key")).toEqual({
        action: "authenticate",
        api_key: "test-api-key",
      });
    });

    it("creates subscribe request without depth level for quote mode", () => {
      const request = createSubscribeRequest(subscriptionKey("INFY", "NSE", 2), 10);
      expect(request).toEqual({ action: "subscribe", symbol: "INFY", exchange: "NSE", mode: 2 });
    });

    it("creates subscribe request with depth level for depth mode", () => {
      const request = createSubscribeRequest(subscriptionKey("INFY", "NSE", 3), 5);
      expect(request.depth_level).toBe(5);
    });

    it("creates unsubscribe request", () => {
      expect(createUnsubscribeRequest(subscriptionKey("TCS", "BSE", 1))).toEqual({
        action: "unsubscribe",
        symbol: "TCS",
        exchange: "BSE",
        mode: 1,
      });
    });
  });

  describe("parseStreamMessage", () => {
    it("parses authentication messages", () => {
      const msg = parseStreamMessage(
        JSON.stringify({ type: "authentication", status: "success", message: "ok" })
      );
      expect(msg.kind).toBe("authentication");
      if (msg.kind === "authentication") {
        expect(msg.message.status).toBe("success");
      }
    });

    it("parses subscription acks and coerces string modes", () => {
      const msg = parseStreamMessage(
        JSON.stringify({
          type: "subscription",
          status: "success",
          symbol: "RELIANCE",
          exchange: "NSE",
          mode: "2",
        })
      );
      expect(msg.kind).toBe("subscription");
      if (msg.kind === "subscription") {
        expect(msg.message.mode).toBe(2);
      }
    });

    it("parses market data and keeps extra fields", () => {
      const msg = parseStreamMessage(
        JSON.stringify({
          type: "market_data",
          mode: 1,
          topic: "RELIANCE.NSE",
          data: { symbol: "RELIANCE", exchange: "NSE", ltp: 2500.5 },
        })
      );
      expect(msg.kind).toBe("market_data");
      if (msg.kind === "market_data") {
        expect(msg.message.data.ltp).toBe(2500.5);
        expect(msg.message.topic).toBe("RELIANCE.NSE");
        expect(keyId(marketDataKey(msg.message))).toBe("RELIANCE|NSE|1");
      }
    });

    it("classifies unknown types", () => {
      expect(parseStreamMessage(JSON.stringify({ type: "unsubscribe", status: "success" }))).toEqual({
        kind: "unknown",
        type: "unsubscribe",
      });
    });

    it("rejects invalid JSON", () => {
      const err = captureError(() => parseStreamMessage("{not json"));
      expect(err.variant).toBe("MalformedMessage");
    });

    it("rejects messages without a type", () => {
      const err = captureError(() => parseStreamMessage(JSON.stringify({ status: "success" })));
      expect(err.message).toBe("Malformed message: missing message type");
    });

    it("reports the failing field", () => {
      const err = captureError(() =>
        parseStreamMessage(
          JSON.stringify({ type: "subscription", status: "success", exchange: "NSE", mode: 1 })
        )
      );
      expect(err.message).toBe("Malformed message: symbol: Required");
    });

    it("rejects unknown modes", () => {
      const err = captureError(() =>
        parseStreamMessage(
          JSON.stringify({
            type: "market_data",
            mode: 7,
            data: { symbol: "RELIANCE", exchange: "NSE" },
          })
        )
      );
      expect(err.variant).toBe("MalformedMessage");
      expect(err.message.startsWith("Malformed message: mode: ")).toBe(true);
    });
  });
});
