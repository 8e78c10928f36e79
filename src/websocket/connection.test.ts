import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Connection, type ConnectionConfig } from "./connection";
import { StreamError } from "./error";
import { parseStreamMessage } from "./types";
import { MockStreamServer } from "../../test/mockServer";

async function captureError(promise: Promise<unknown>): Promise<StreamError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof StreamError) return e;
    throw e;
  }
  throw new Error("expected a StreamError");
}

describe("Connection", () => {
  let server: MockStreamServer;
  let messages: string[];
  let closes: Array<{ code: number; reason: string }>;
  let connection: Connection;

  function createConnection(config: ConnectionConfig = {}): Connection {
    const created: Connection = new Connection(
      {
        onMessage: (text) => {
          messages.push(text);
          const msg = parseStreamMessage(text);
          if (msg.kind === "authentication") {
            created.handleAuthenticationResult(
              msg.message.status === "success",
              msg.message.message ?? msg.message.status
            );
          }
        },
        onClose: (code, reason) => {
          closes.push({ code, reason });
        },
      },
      server.url(),
      { apiKey: "test-api-key", ...config }
    );
    return created;
  }

  beforeEach(async () => {
    server = new MockStreamServer();
    await server.start();
    messages = [];
    closes = [];
    connection = createConnection();
  });

  afterEach(async () => {
    await connection.close();
    await server.stop();
  });

  describe("connect", () => {
    it("opens the socket and authenticates", async () => {
      await expect(connection.connect()).resolves.toBe("Connected");

      expect(connection.getState()).toBe("Open");
      expect(connection.isAuthenticated()).toBe(true);
      expect(server.requests("authenticate")).toEqual([
        { action: "authenticate", api_key: "test-api-key" },
      ]);
    });

    it("is a no-op when already open", async () => {
      await connection.connect();
      await expect(connection.connect()).resolves.toBe("AlreadyConnected");
      expect(server.connections).toBe(1);
    });

    it("refuses a second connect while one is running", async () => {
      const first = connection.connect();
      const err = await captureError(connection.connect());
      expect(err.variant).toBe("ConnectInProgress");
      await expect(first).resolves.toBe("Connected");
    });

    it("requires an API key", async () => {
      connection = createConnection({ apiKey: "" });
      const err = await captureError(connection.connect());
      expect(err.variant).toBe("MissingApiKey");
      expect(server.connections).toBe(0);
    });

    it("reports an unreachable server", async () => {
      const url = server.url();
      await server.stop();
      const err = await captureError(connection.connect(url));
      expect(err.variant).toBe("ConnectionFailed");
      expect(connection.getState()).toBe("Disconnected");
    });

    it("reports an invalid URL", async () => {
      const err = await captureError(connection.connect("not a url"));
      expect(err.variant).toBe("InvalidUrl");
    });

    it("switches to the URL passed in", async () => {
      const other = new MockStreamServer();
      const otherUrl = await other.start();
      try {
        await connection.connect(otherUrl);
        expect(connection.getUrl()).toBe(otherUrl);
        expect(other.connections).toBe(1);
        expect(server.connections).toBe(0);
      } finally {
        await connection.close();
        await other.stop();
      }
    });
  });

  describe("confirmed authentication", () => {
    it("surfaces a rejection and stays unauthenticated", async () => {
      server.setOptions({ auth: "reject" });
      const err = await captureError(connection.connect());

      expect(err.variant).toBe("AuthenticationRejected");
      expect(err.message).toBe("Authentication rejected: Invalid API key");
      expect(connection.getState()).toBe("Open");
      expect(connection.isAuthenticated()).toBe(false);
    });

    it("times out when the server never answers", async () => {
      server.setOptions({ auth: "none" });
      connection = createConnection({ authTimeoutMs: 50 });
      const err = await captureError(connection.connect());

      expect(err.variant).toBe("AuthenticationTimeout");
      expect(connection.isAuthenticated()).toBe(false);
    });

    it("can authenticate again on the open socket", async () => {
      server.setOptions({ auth: "none" });
      connection = createConnection({ authTimeoutMs: 50 });
      await captureError(connection.connect());

      server.setOptions({ auth: "success" });
      await connection.authenticate();
      expect(connection.isAuthenticated()).toBe(true);
      expect(server.requests("authenticate")).toHaveLength(2);
    });
  });

  describe("assumed authentication", () => {
    it("marks the socket authenticated after the grace period", async () => {
      server.setOptions({ auth: "none" });
      connection = createConnection({ confirmation: "assumed", assumedAuthGraceMs: 20 });

      await expect(connection.connect()).resolves.toBe("Connected");
      expect(connection.isAuthenticated()).toBe(true);
    });

    it("honours a rejection inside the grace period", async () => {
      server.setOptions({ auth: "reject" });
      connection = createConnection({ confirmation: "assumed", assumedAuthGraceMs: 100 });

      const err = await captureError(connection.connect());
      expect(err.variant).toBe("AuthenticationRejected");
      expect(connection.isAuthenticated()).toBe(false);
    });

    it("fails when the socket closes inside the grace period", async () => {
      server.setOptions({ auth: "close" });
      connection = createConnection({ confirmation: "assumed", assumedAuthGraceMs: 200 });

      const err = await captureError(connection.connect());
      expect(err.variant).toBe("NotConnected");
      expect(connection.getState()).toBe("Disconnected");
      expect(connection.isAuthenticated()).toBe(false);
      expect(closes).toEqual([{ code: 1011, reason: "closing" }]);
    });
  });

  describe("send", () => {
    it("refuses to send before connecting", async () => {
      const err = await captureError(connection.sendText("pong"));
      expect(err.variant).toBe("NotConnected");
    });

    it("delivers raw frames", async () => {
      await connection.connect();
      await connection.sendText("pong");
      await vi.waitFor(() => expect(server.count("pong")).toBe(1));
    });
  });

  describe("receive", () => {
    it("hands every frame to the message handler", async () => {
      await connection.connect();
      server.broadcastRaw("ping");
      await vi.waitFor(() => expect(messages).toContain("ping"));
    });

    it("survives a handler that throws", async () => {
      await connection.connect();
      server.broadcastRaw("{not json");
      server.broadcastRaw(JSON.stringify({ type: "unknown_type" }));
      await vi.waitFor(() => expect(messages).toHaveLength(3));
      expect(connection.getState()).toBe("Open");
    });
  });

  describe("close", () => {
    it("reports a server close", async () => {
      await connection.connect();
      server.closeClients(1001, "server restart");

      await vi.waitFor(() => expect(closes).toEqual([{ code: 1001, reason: "server restart" }]));
      expect(connection.getState()).toBe("Disconnected");
      expect(connection.isAuthenticated()).toBe(false);
    });

    it("closes cooperatively", async () => {
      await connection.connect();
      await connection.close();

      expect(connection.getState()).toBe("Disconnected");
      expect(closes).toHaveLength(1);
      await vi.waitFor(() => expect(server.clientCount()).toBe(0));
    });

    it("is a no-op when never connected", async () => {
      await connection.close();
      expect(connection.getState()).toBe("Disconnected");
      expect(closes).toEqual([]);
    });
  });
});
