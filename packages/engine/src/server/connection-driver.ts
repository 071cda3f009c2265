import {
  IncompleteRequestDataError,
  parseHttpRequest,
} from "../http/request-parser.js";
import { HttpResponse } from "../http/response.js";
import { renderResponse } from "../http/response-writer.js";
import { getField, type HttpRequest, type RequestHeader } from "../http/types.js";
import type { Logger } from "../logging/logger.js";
import type { RequestHandler } from "../router/router.js";
import { decodeStrict } from "../utils/buffer.js";

export type DriverState =
  | { readonly kind: "idle" }
  | { readonly kind: "pending-continuation"; readonly header: RequestHeader }
  | { readonly kind: "ended" };

export interface ConnectionDriverOptions {
  handler: RequestHandler;
  logger: Logger;
  /** Used to tag log lines. */
  connectionId?: number;
  /** Log each dispatched request at info level. Default: true */
  logRequests?: boolean;
}

const IDLE: DriverState = { kind: "idle" };
const EMPTY = new Uint8Array(0);

function expectsContinue(header: RequestHeader): boolean {
  return getField(header, "Expect")?.trim().toLowerCase() === "100-continue";
}

/**
 * Per-connection protocol state. Each chunk read from the peer goes through
 * `handleChunk`, and the bytes it returns are written back before the next
 * read. A request announcing `Expect: 100-continue` is answered with an
 * interim 100 response; the next chunk is then taken whole as its body.
 */
export class ConnectionDriver {
  private current: DriverState = IDLE;
  private readonly handler: RequestHandler;
  private readonly logger: Logger;
  private readonly label: string;
  private readonly logRequests: boolean;

  constructor(options: ConnectionDriverOptions) {
    this.handler = options.handler;
    this.logger = options.logger;
    this.label =
      options.connectionId === undefined ? "" : ` - #${options.connectionId}`;
    this.logRequests = options.logRequests ?? true;
  }

  get state(): DriverState {
    return this.current;
  }

  /** Returns the reply for this chunk; an empty array means nothing to send. */
  handleChunk(chunk: Uint8Array): Uint8Array {
    const state = this.current;
    switch (state.kind) {
      case "ended":
        return EMPTY;
      case "idle":
        return this.handleNewRequest(chunk);
      case "pending-continuation":
        return this.handleContinuationBody(state.header, chunk);
    }
  }

  /** End of stream: drop any pending continuation. */
  end(): void {
    if (this.current.kind === "pending-continuation") {
      this.logger.debug(
        `Connection closed while waiting for request body${this.label}`,
      );
    }
    this.current = { kind: "ended" };
  }

  private handleNewRequest(chunk: Uint8Array): Uint8Array {
    let parsed: ReturnType<typeof parseHttpRequest>;
    try {
      parsed = parseHttpRequest(chunk);
    } catch (err) {
      this.reportParseFailure(err);
      return EMPTY;
    }

    if (expectsContinue(parsed.header)) {
      this.current = {
        kind: "pending-continuation",
        header: parsed.header,
      };
      return renderResponse(new HttpResponse({ status: 100 }));
    }

    return this.dispatch({ header: parsed.header, body: parsed.body });
  }

  private handleContinuationBody(
    header: RequestHeader,
    chunk: Uint8Array,
  ): Uint8Array {
    this.current = IDLE;

    const body = decodeStrict(chunk);
    if (body === null) {
      this.reportParseFailure(
        new IncompleteRequestDataError(
          "Request body could not be decoded as UTF-8 text",
        ),
      );
      return EMPTY;
    }

    return this.dispatch({ header, body });
  }

  private dispatch(request: HttpRequest): Uint8Array {
    if (this.logRequests) {
      this.logger.info(
        `${request.header.method} ${request.header.path}${this.label}`,
      );
    }

    let response: HttpResponse;
    try {
      response = this.handler.handle(request);
    } catch (err) {
      this.logger.error(
        `Handler failed for ${request.header.method} ${request.header.path}${this.label}:`,
        err,
      );
      response = new HttpResponse({ status: 500, body: "Internal Server Error" });
    }
    return renderResponse(response);
  }

  private reportParseFailure(err: unknown): void {
    if (err instanceof IncompleteRequestDataError) {
      this.logger.warn(`Dropping request${this.label}: ${err.message}`);
      return;
    }
    throw err;
  }
}
