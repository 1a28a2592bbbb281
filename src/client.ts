/**
 * TodoClient - HTTP client for the todo API.
 * @module client
 */

import { TransportError, createErrorFromNetworkFailure } from "./errors.js";
import {
  TODOS_PATH,
  type CreateTodo,
  type TodoId,
  type UpdateTodo,
} from "./todo/schema.js";

/**
 * A response as received, before rendering.
 */
export interface TodoResponse {
  /** HTTP status code */
  status: number;
  /** Reason phrase, e.g. "Created" */
  statusText: string;
  /** Content-Type header, if the server sent one */
  contentType: string | undefined;
  /** Body decoded as UTF-8 */
  text: string;
  /** Parsed body when the content type is JSON and the body is not empty */
  json: unknown;
}

/**
 * Whether a Content-Type value denotes JSON.
 */
export function isJsonContentType(contentType: string | undefined): boolean {
  return contentType?.toLowerCase().startsWith("application/json") ?? false;
}

/**
 * TodoClient issues one request per call against a todo API server and
 * returns the raw response. Non-2xx statuses are responses, not errors.
 *
 * @example
 * ```typescript
 * const client = new TodoClient("http://127.0.0.1:3000");
 * const res = await client.create({ body: "buy milk" });
 * console.log(res.status, res.json);
 * ```
 */
export class TodoClient {
  private readonly origin: string;

  /**
   * @param baseUrl - Server URL; only its scheme and authority are used
   * @throws {TypeError} If baseUrl is not an absolute http(s) URL
   */
  constructor(baseUrl: string) {
    let url: URL;
    try {
      url = new URL(baseUrl);
    } catch (error) {
      throw new TypeError(`Invalid base URL: ${baseUrl}`, { cause: error });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new TypeError(
        `Invalid base URL: ${baseUrl} (expected http:// or https://)`,
      );
    }
    this.origin = url.origin;
  }

  /**
   * Full URL for a route path.
   */
  urlFor(path: string): string {
    return `${this.origin}${path}`;
  }

  list(): Promise<TodoResponse> {
    return this.request("GET", TODOS_PATH);
  }

  read(id: TodoId): Promise<TodoResponse> {
    return this.request("GET", `${TODOS_PATH}/${id}`);
  }

  create(input: CreateTodo): Promise<TodoResponse> {
    return this.request("POST", TODOS_PATH, { body: input.body });
  }

  update(id: TodoId, input: UpdateTodo): Promise<TodoResponse> {
    return this.request("PUT", `${TODOS_PATH}/${id}`, {
      body: input.body,
      completed: input.completed,
    });
  }

  delete(id: TodoId): Promise<TodoResponse> {
    return this.request("DELETE", `${TODOS_PATH}/${id}`);
  }

  /**
   * Send a request and read the whole response.
   *
   * @throws {TransportError} If the server is unreachable or the body
   *   cannot be decoded
   */
  async request(
    method: string,
    path: string,
    body?: unknown,
  ): Promise<TodoResponse> {
    const url = this.urlFor(path);
    const init: RequestInit = {
      method,
      headers: { "Content-Type": "application/json" },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    let response: Response;
    let bytes: ArrayBuffer;
    try {
      response = await fetch(url, init);
      bytes = await response.arrayBuffer();
    } catch (error) {
      throw createErrorFromNetworkFailure(error, url);
    }

    const text = decodeUtf8(bytes);
    const contentType = response.headers.get("content-type") ?? undefined;

    return {
      status: response.status,
      statusText: response.statusText,
      contentType,
      text,
      json:
        isJsonContentType(contentType) && text.length > 0
          ? parseJson(text)
          : undefined,
    };
  }
}

function decodeUtf8(bytes: ArrayBuffer): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new TransportError(
      "Response body is not valid UTF-8",
      "INVALID_PAYLOAD",
      { cause: error },
    );
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new TransportError(
      "Response body is not valid JSON",
      "INVALID_PAYLOAD",
      { cause: error },
    );
  }
}
