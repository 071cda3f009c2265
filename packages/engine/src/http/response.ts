import { formatJson, stringify } from "../json/json-formatter.js";
import type { JsonValue } from "../json/json-value.js";
import { statusText } from "./types.js";

export interface HttpResponseInit {
  status?: number;
  contentType?: string;
  body?: string;
  headers?: Map<string, string> | Record<string, string>;
}

/**
 * Response builder. A handler fills it in once; the driver renders it once.
 */
export class HttpResponse {
  status: number;
  contentType: string;
  body: string;
  /** Extra header lines, written after Content-Type and Content-Length. */
  readonly headers: Map<string, string>;

  constructor(init: HttpResponseInit = {}) {
    this.status = init.status ?? 200;
    this.contentType = init.contentType ?? "text/html";
    this.body = init.body ?? "";
    this.headers =
      init.headers instanceof Map
        ? new Map(init.headers)
        : new Map(Object.entries(init.headers ?? {}));
  }

  get statusText(): string {
    return statusText(this.status);
  }

  setHeader(name: string, value: string): this {
    this.headers.set(name, value);
    return this;
  }

  static json(value: JsonValue, status = 200): HttpResponse {
    return new HttpResponse({
      status,
      contentType: "application/json",
      body: formatJson(value),
    });
  }

  /** Like `json`, but converts plain data first. */
  static data(value: unknown, status = 200): HttpResponse {
    return new HttpResponse({
      status,
      contentType: "application/json",
      body: stringify(value),
    });
  }

  static text(body: string, status = 200): HttpResponse {
    return new HttpResponse({ status, contentType: "text/plain", body });
  }
}
