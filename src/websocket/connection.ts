/**
 * The single physical socket to the OpenAlgo streaming server.
 *
 * Owns the connect lifecycle and the API-key handshake. Every inbound text
 * frame is passed to `handlers.onMessage`; nothing thrown there escapes the
 * receive path.
 */

import WebSocket from "ws";
import type { Logger } from "pino";
import { createChildLogger } from "../logger";
import { StreamError, toStreamError } from "./error";
import { PendingRequests } from "./pending";
import { createAuthenticateRequest, type StreamRequest } from "./types";
import {
  DEFAULT_WS_URL,
  AUTH_TIMEOUT_MS,
  ASSUMED_AUTH_GRACE_MS,
  CLOSE_TIMEOUT_MS,
} from "./constants";

/**
 * Connection state.
 */
export type ConnectionState = "Disconnected" | "Connecting" | "Open" | "Closing";

/**
 * How server acknowledgements are treated. Servers differ on whether they
 * answer the authenticate and subscribe messages at all.
 *
 * - `confirmed`: wait for the server's `authentication` / `subscription` reply
 * - `assumed`: treat silence as success (after a short grace period for auth)
 */
export type ConfirmationMode = "confirmed" | "assumed";

/**
 * Connection configuration.
 */
export interface ConnectionConfig {
  /** API key sent in the authenticate message */
  apiKey?: string;
  /** Acknowledgement policy (default: confirmed) */
  confirmation?: ConfirmationMode;
  /** Confirmed mode: how long to wait for the authentication result (ms) */
  authTimeoutMs?: number;
  /** Assumed mode: grace period before marking the connection authenticated (ms) */
  assumedAuthGraceMs?: number;
}

/**
 * Result of a connect call that did not fail.
 */
export type ConnectOutcome = "AlreadyConnected" | "Connected";

/**
 * Callbacks the connection drives.
 */
export interface ConnectionHandlers {
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
}

const AUTH_REQUEST_ID = "authenticate";

/**
 * Decode a ws payload into text.
 */
function messageText(data: WebSocket.Data): string {
  if (typeof data === "string") return data;
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export class Connection {
  private url: string;
  private config: Required<Omit<ConnectionConfig, "apiKey">> & { apiKey: string };
  private state: ConnectionState = "Disconnected";
  private ws: WebSocket | null = null;
  private connecting = false;
  private authenticated = false;
  private authResult: boolean | undefined;
  private pendingAuth: PendingRequests<void> = new PendingRequests();
  private handlers: ConnectionHandlers;
  private log: Logger;

  constructor(
    handlers: ConnectionHandlers,
    url: string = DEFAULT_WS_URL,
    config: ConnectionConfig = {},
    log: Logger = createChildLogger({ component: "connection" })
  ) {
    this.url = url;
    this.config = {
      apiKey: config.apiKey ?? "",
      confirmation: config.confirmation ?? "confirmed",
      authTimeoutMs: config.authTimeoutMs ?? AUTH_TIMEOUT_MS,
      assumedAuthGraceMs: config.assumedAuthGraceMs ?? ASSUMED_AUTH_GRACE_MS,
    };
    this.handlers = handlers;
    this.log = log;
  }

  /**
   * Open the socket and authenticate.
   *
   * Resolves `AlreadyConnected` when the socket is already open. If the
   * handshake fails the socket stays open but unauthenticated.
   */
  async connect(url?: string): Promise<ConnectOutcome> {
    if (this.connecting) {
      throw StreamError.connectInProgress();
    }
    if (this.state === "Open") {
      return "AlreadyConnected";
    }
    if (url) {
      this.url = url;
    }
    if (!this.config.apiKey) {
      throw StreamError.missingApiKey();
    }

    this.connecting = true;
    try {
      await this.openTransport();
      this.log.info({ url: this.url }, "WebSocket connected");
      await this.authenticate();
      return "Connected";
    } finally {
      this.connecting = false;
    }
  }

  /**
   * Send the API key and wait for the configured confirmation.
   */
  async authenticate(): Promise<void> {
    if (!this.config.apiKey) {
      throw StreamError.missingApiKey();
    }

    this.authenticated = false;
    this.authResult = undefined;
    const request = createAuthenticateRequest(this.config.apiKey);

    if (this.config.confirmation === "assumed") {
      const ws = this.ws;
      await this.send(request);
      await new Promise((resolve) => setTimeout(resolve, this.config.assumedAuthGraceMs));
      if (this.authResult === false) {
        throw StreamError.authenticationRejected("server refused the API key");
      }
      if (this.ws !== ws || this.state !== "Open") {
        throw StreamError.notConnected();
      }
      this.authenticated = true;
      this.log.info("Authentication assumed after grace period");
      return;
    }

    const timeoutMs = this.config.authTimeoutMs;
    const result = this.pendingAuth.register(AUTH_REQUEST_ID, timeoutMs, () =>
      StreamError.authenticationTimeout(timeoutMs)
    );
    const sent = this.send(request).catch((e: unknown) => {
      this.pendingAuth.reject(AUTH_REQUEST_ID, toStreamError(e));
    });
    await Promise.all([sent, result]);
    this.log.info("Authenticated");
  }

  /**
   * Record the server's answer to the authenticate message.
   */
  handleAuthenticationResult(success: boolean, reason: string): void {
    this.authResult = success;
    this.authenticated = success;
    if (success) {
      this.pendingAuth.resolve(AUTH_REQUEST_ID, undefined);
    } else {
      this.log.warn({ reason }, "Authentication rejected");
      this.pendingAuth.reject(AUTH_REQUEST_ID, StreamError.authenticationRejected(reason));
    }
  }

  /**
   * Send a request as JSON.
   */
  send(request: StreamRequest): Promise<void> {
    return this.sendText(JSON.stringify(request));
  }

  /**
   * Send a raw text frame.
   */
  sendText(text: string): Promise<void> {
    const ws = this.ws;
    if (!ws || this.state !== "Open") {
      return Promise.reject(StreamError.notConnected());
    }
    return new Promise((resolve, reject) => {
      ws.send(text, (err) => {
        if (err) {
          reject(StreamError.connectionFailed(err.message));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Close the socket. Waits for the close handshake, then terminates.
   */
  async close(): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      this.state = "Disconnected";
      return;
    }

    this.state = "Closing";
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => ws.terminate(), CLOSE_TIMEOUT_MS);
      ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      ws.close(1000, "Client disconnect");
    });
  }

  /**
   * Get the current connection state.
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Check if the API key was accepted on the current socket.
   */
  isAuthenticated(): boolean {
    return this.authenticated;
  }

  /**
   * Get the WebSocket URL.
   */
  getUrl(): string {
    return this.url;
  }

  /**
   * Change the URL used by the next connect.
   */
  setUrl(url: string): void {
    this.url = url;
  }

  /**
   * Open the transport and wire the socket callbacks.
   */
  private openTransport(): Promise<void> {
    return new Promise((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(this.url);
      } catch (e) {
        this.log.warn({ url: this.url, err: e }, "Rejected WebSocket URL");
        reject(StreamError.invalidUrl(this.url));
        return;
      }

      this.ws = ws;
      this.state = "Connecting";
      let opened = false;

      ws.onopen = () => {
        opened = true;
        this.state = "Open";
        resolve();
      };

      ws.onmessage = (event) => {
        this.receive(messageText(event.data));
      };

      ws.onerror = (event) => {
        if (!opened) {
          reject(StreamError.connectionFailed(event.message));
        } else {
          this.log.error({ err: event.error }, "WebSocket error");
        }
      };

      ws.onclose = (event) => {
        if (!opened) {
          reject(StreamError.connectionFailed(`socket closed during handshake (code ${event.code})`));
        }
        this.handleClose(ws, event.code, event.reason);
      };
    });
  }

  private receive(text: string): void {
    try {
      this.handlers.onMessage(text);
    } catch (e) {
      this.log.error({ err: e }, "Error processing message");
    }
  }

  private handleClose(ws: WebSocket, code: number, reason: string): void {
    if (this.ws !== ws) {
      return;
    }

    this.ws = null;
    this.state = "Disconnected";
    this.authenticated = false;
    this.pendingAuth.rejectAll(StreamError.transportClosed(code, reason));
    this.log.info({ code, reason }, "WebSocket closed");

    try {
      this.handlers.onClose(code, reason);
    } catch (e) {
      this.log.error({ err: e }, "Close handler error");
    }
  }
}
