/**
 * Error types for the OpenAlgo streaming session.
 */

/**
 * Stream error variants.
 */
export type StreamErrorVariant =
  | "NotConnected"
  | "ConnectInProgress"
  | "ConnectionFailed"
  | "NotAuthenticated"
  | "AuthenticationTimeout"
  | "AuthenticationRejected"
  | "SubscriptionTimeout"
  | "SubscriptionRejected"
  | "MalformedMessage"
  | "TransportClosed"
  | "InvalidUrl"
  | "InvalidArgument"
  | "MissingApiKey"
  | "InvalidConfig";

/**
 * Stream error class.
 */
export class StreamError extends Error {
  readonly variant: StreamErrorVariant;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    variant: StreamErrorVariant,
    message: string,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "StreamError";
    this.variant = variant;
    this.code = code;
    this.details = details;
  }

  /** Operation needs an open socket */
  static notConnected(): StreamError {
    return new StreamError("NotConnected", "Not connected to server");
  }

  /** A connect is already underway */
  static connectInProgress(): StreamError {
    return new StreamError("ConnectInProgress", "Connection already in progress");
  }

  /** Failed to establish the transport */
  static connectionFailed(message: string): StreamError {
    return new StreamError("ConnectionFailed", `Connection failed: ${message}`);
  }

  /** Socket is open but the API key was not accepted (yet) */
  static notAuthenticated(): StreamError {
    return new StreamError("NotAuthenticated", "Not authenticated");
  }

  /** No authentication result within the timeout */
  static authenticationTimeout(timeoutMs: number): StreamError {
    return new StreamError(
      "AuthenticationTimeout",
      `Authentication timed out after ${timeoutMs}ms`,
      undefined,
      { timeoutMs }
    );
  }

  /** Server answered the authentication with a non-success status */
  static authenticationRejected(reason: string): StreamError {
    return new StreamError("AuthenticationRejected", `Authentication rejected: ${reason}`);
  }

  /** No subscription ack within the timeout */
  static subscriptionTimeout(key: string, timeoutMs: number): StreamError {
    return new StreamError(
      "SubscriptionTimeout",
      `Subscription to ${key} timed out after ${timeoutMs}ms`,
      undefined,
      { key, timeoutMs }
    );
  }

  /** Server refused the subscription, or it was cancelled locally */
  static subscriptionRejected(key: string, reason: string): StreamError {
    return new StreamError(
      "SubscriptionRejected",
      `Subscription to ${key} rejected: ${reason}`,
      undefined,
      { key }
    );
  }

  /** Inbound frame could not be parsed or validated */
  static malformedMessage(message: string): StreamError {
    return new StreamError("MalformedMessage", `Malformed message: ${message}`);
  }

  /** Socket closed while something was still waiting on it */
  static transportClosed(code: number, reason: string): StreamError {
    return new StreamError(
      "TransportClosed",
      `Transport closed: code ${code}, reason: ${reason || "no reason"}`,
      String(code)
    );
  }

  /** Invalid URL */
  static invalidUrl(message: string): StreamError {
    return new StreamError("InvalidUrl", `Invalid URL: ${message}`);
  }

  /** Caller passed an unusable argument */
  static invalidArgument(message: string): StreamError {
    return new StreamError("InvalidArgument", message);
  }

  /** No API key configured */
  static missingApiKey(): StreamError {
    return new StreamError("MissingApiKey", "API key not set");
  }

  /** Environment failed validation */
  static invalidConfig(message: string): StreamError {
    return new StreamError("InvalidConfig", `Invalid configuration: ${message}`);
  }
}

/**
 * Extract a message from anything thrown.
 */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Wrap a foreign error so callers only ever see StreamError.
 */
export function toStreamError(e: unknown): StreamError {
  return e instanceof StreamError ? e : StreamError.connectionFailed(errorMessage(e));
}

/**
 * Render an error as the status string handed to pollers.
 */
export function errorStatus(e: unknown): string {
  return `Error: ${errorMessage(e)}`;
}
