import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { PendingRequests } from "./pending";
import { StreamError } from "./error";

describe("PendingRequests", () => {
  let pending: PendingRequests<string>;

  beforeEach(() => {
    vi.useFakeTimers();
    pending = new PendingRequests();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves a registered request", async () => {
    const promise = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    expect(pending.has("a")).toBe(true);
    expect(pending.resolve("a", "done")).toBe(true);
    await expect(promise).resolves.toBe("done");
    expect(pending.has("a")).toBe(false);
  });

  it("rejects a registered request", async () => {
    const promise = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    pending.reject("a", StreamError.authenticationRejected("nope"));
    await expect(promise).rejects.toThrow("Authentication rejected: nope");
  });

  it("times out and removes the entry", async () => {
    const promise = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    const assertion = expect(promise).rejects.toThrow("Authentication timed out after 1000ms");
    vi.advanceTimersByTime(1000);
    await assertion;
    expect(pending.has("a")).toBe(false);
    expect(pending.resolve("a", "late")).toBe(false);
  });

  it("does not time out after resolving", async () => {
    const promise = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    pending.resolve("a", "done");
    vi.advanceTimersByTime(5000);
    await expect(promise).resolves.toBe("done");
  });

  it("shares one promise between concurrent registrations", () => {
    const first = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    const second = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    expect(second).toBe(first);
    expect(pending.size()).toBe(1);
    pending.resolve("a", "done");
  });

  it("returns false when nothing is waiting", () => {
    expect(pending.resolve("missing", "x")).toBe(false);
    expect(pending.reject("missing", StreamError.notConnected())).toBe(false);
  });

  it("rejects everything outstanding", async () => {
    const a = pending.register("a", 1000, () => StreamError.authenticationTimeout(1000));
    const b = pending.register("b", 1000, () => StreamError.authenticationTimeout(1000));
    expect(pending.rejectAll(StreamError.transportClosed(1001, "bye"))).toBe(2);
    await expect(a).rejects.toThrow("Transport closed: code 1001, reason: bye");
    await expect(b).rejects.toThrow("Transport closed: code 1001, reason: bye");
    expect(pending.size()).toBe(0);
  });
});
