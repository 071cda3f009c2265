import { HttpResponse } from "../http/response.js";
import type { HttpRequest } from "../http/types.js";

export type RouteParams = Readonly<Record<string, string>>;

export type RouteHandler = (
  request: HttpRequest,
  params: RouteParams,
) => HttpResponse;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface Route {
  readonly method: HttpMethod;
  readonly pattern: string;
  readonly segments: readonly string[];
  readonly handler: RouteHandler;
}

export interface RouteMatch {
  route: Route;
  params: RouteParams;
}

/** Anything the connection driver can dispatch a complete request to. */
export interface RequestHandler {
  handle(request: HttpRequest): HttpResponse;
}

export interface RouterOptions {
  /**
   * When false (the default) a route answers every method, whatever it was
   * registered with.
   */
  enforceMethod?: boolean;
}

export function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

function isParameter(segment: string): boolean {
  return segment.startsWith(":");
}

/**
 * Linear route table. The first registered route with the same number of
 * segments whose literal segments all match wins; `:name` segments match
 * anything and are bound into the params.
 */
export class Router implements RequestHandler {
  private readonly routes: Route[] = [];
  private readonly enforceMethod: boolean;

  constructor(options: RouterOptions = {}) {
    this.enforceMethod = options.enforceMethod ?? false;
  }

  register(method: HttpMethod, pattern: string, handler: RouteHandler): this {
    this.routes.push({
      method,
      pattern,
      segments: splitPath(pattern),
      handler,
    });
    return this;
  }

  get(pattern: string, handler: RouteHandler): this {
    return this.register("GET", pattern, handler);
  }

  post(pattern: string, handler: RouteHandler): this {
    return this.register("POST", pattern, handler);
  }

  put(pattern: string, handler: RouteHandler): this {
    return this.register("PUT", pattern, handler);
  }

  delete(pattern: string, handler: RouteHandler): this {
    return this.register("DELETE", pattern, handler);
  }

  match(method: string, path: string): RouteMatch | null {
    const requested = splitPath(path);
    const wantedMethod = method.toUpperCase();

    for (const route of this.routes) {
      if (this.enforceMethod && route.method !== wantedMethod) continue;
      if (route.segments.length !== requested.length) continue;

      const bound: Array<[string, string]> = [];
      let matches = true;
      for (let i = 0; i < requested.length; i++) {
        const segment = route.segments[i];
        if (isParameter(segment)) {
          bound.push([segment.slice(1), requested[i]]);
        } else if (segment !== requested[i]) {
          matches = false;
          break;
        }
      }

      if (matches) {
        return { route, params: Object.fromEntries(bound) };
      }
    }

    return null;
  }

  /** Dispatch a request; with no matching route the default response is returned. */
  handle(request: HttpRequest): HttpResponse {
    const found = this.match(request.header.method, request.header.path);
    if (!found) {
      return new HttpResponse();
    }
    return found.route.handler(request, found.params);
  }
}
