// ---------------------------------------------------------------------------
// Barte SDK – HTTP Transport Layer
// ---------------------------------------------------------------------------
// A thin HTTP client built on the global `fetch()` API.
// Handles:
//   - X-Token-Api authentication
//   - JSON request bodies and string-keyed query parameters
//   - Structured error mapping via RemoteApiError / ConnectionError
//   - Empty 2xx bodies surfaced as the NO_CONTENT sentinel
//
// No retries and no timeout of its own: a single call is a single request.
// ---------------------------------------------------------------------------

import type { ClientConfig } from "./config";
import { ConnectionError, DecodingError, RemoteApiError } from "./errors";
import type { Logger } from "./logger";
import { SDK_VERSION } from "./version";

/** Supported HTTP methods for the Barte API. */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/** Any value `JSON.parse` can produce. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Query parameters; `undefined` entries are dropped. */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/** Returned by the transport for a 2xx response with an empty body. */
export const NO_CONTENT: unique symbol = Symbol("barte.no-content");

export type TransportResult = JsonValue | typeof NO_CONTENT;

/**
 * The single capability resources need from the network: send one request
 * and hand back the parsed JSON body.
 */
export interface Transport {
  send(
    method: HttpMethod,
    path: string,
    query?: QueryParams,
    body?: unknown,
  ): Promise<TransportResult>;
}

/**
 * Default transport used by every resource module.
 */
export class HttpClient implements Transport {
  private readonly config: ClientConfig;
  private readonly logger: Logger;

  constructor(config: ClientConfig, logger: Logger) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Execute an HTTP request against the Barte API.
   *
   * @returns Parsed JSON body, or `NO_CONTENT` when the body is empty.
   * @throws  {RemoteApiError} on any non-2xx response.
   * @throws  {ConnectionError} when no response was received.
   * @throws  {DecodingError} when a 2xx body is not valid JSON.
   */
  async send(
    method: HttpMethod,
    path: string,
    query?: QueryParams,
    body?: unknown,
  ): Promise<TransportResult> {
    const url = this.buildUrl(path, query);
    const init: RequestInit = { method, headers: this.buildHeaders() };

    if (body !== undefined && method !== "GET") {
      init.body = JSON.stringify(body);
    }

    this.logger.debug({ method, url: url.toString() }, "barte request");

    let response: Response;
    let text: string;
    try {
      response = await fetch(url.toString(), init);
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error({ method, path, err: error }, "barte request failed");
      throw new ConnectionError(`Network error: ${reason}`, error);
    }

    if (!response.ok) {
      const errorBody = text.trim() === "" ? undefined : parseLenient(text);
      this.logger.warn(
        { method, path, status: response.status, body: errorBody },
        "barte request rejected",
      );
      throw new RemoteApiError(response.status, errorBody);
    }

    this.logger.debug({ method, path, status: response.status }, "barte response");

    if (text.trim() === "") return NO_CONTENT;

    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch {
      throw new DecodingError("response body", [
        { field: "", message: "Response body is not valid JSON" },
      ]);
    }
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  /** Construct the full URL with query parameters, filtering out undefined values. */
  private buildUrl(path: string, query?: QueryParams): URL {
    const url = new URL(`${this.config.baseUrl}${path}`);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url;
  }

  private buildHeaders(): Record<string, string> {
    return {
      ...this.config.authHeader,
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": `barte-node/${SDK_VERSION}`,
    };
  }
}

/** Parse JSON when possible; otherwise keep the raw text. */
function parseLenient(text: string): unknown {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

/** The JSON body of a transport result, or `undefined` for NO_CONTENT. */
export function bodyOf(result: TransportResult): JsonValue | undefined {
  return result === NO_CONTENT ? undefined : result;
}
