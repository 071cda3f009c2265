import { describe, expect, it } from "vitest";
import type { ITcpSocket } from "../interfaces/socket.js";
import { decodeToString } from "../utils/buffer.js";
import { HttpResponse } from "./response.js";
import { renderResponse, sendResponse } from "./response-writer.js";
import { statusText } from "./types.js";

function render(response: HttpResponse): string {
  return decodeToString(renderResponse(response));
}

describe("renderResponse", () => {
  it("renders the defaults", () => {
    expect(render(new HttpResponse())).toBe(
      "HTTP/1.1 200 OK\nContent-Type: text/html\nContent-Length: 0\n\n",
    );
  });

  it("uses the reason phrase table", () => {
    expect(render(new HttpResponse({ status: 404 }))).toBe(
      "HTTP/1.1 404 Not Found\nContent-Type: text/html\nContent-Length: 0\n\n",
    );
  });

  it("renders Custom for an unmapped status", () => {
    expect(render(new HttpResponse({ status: 999 }))).toBe(
      "HTTP/1.1 999 Custom\nContent-Type: text/html\nContent-Length: 0\n\n",
    );
  });

  it("writes additional headers after the fixed ones, in order", () => {
    const response = new HttpResponse({
      status: 201,
      contentType: "application/json",
      body: '{"ok":true}',
      headers: { "X-One": "1", "X-Two": "2" },
    });

    expect(render(response)).toBe(
      'HTTP/1.1 201 Created\nContent-Type: application/json\nContent-Length: 11\nX-One: 1\nX-Two: 2\n\n{"ok":true}',
    );
  });

  it("counts the body length in bytes", () => {
    expect(render(HttpResponse.text("héllo"))).toBe(
      "HTTP/1.1 200 OK\nContent-Type: text/plain\nContent-Length: 6\n\nhéllo",
    );
  });

  it("reflects changes made through the builder", () => {
    const response = new HttpResponse();
    response.status = 100;
    response.setHeader("Retry-After", "5");

    expect(render(response)).toBe(
      "HTTP/1.1 100 Continue\nContent-Type: text/html\nContent-Length: 0\nRetry-After: 5\n\n",
    );
  });
});

describe("statusText", () => {
  it("covers the table's edges", () => {
    expect(statusText(101)).toBe("Switching Protocols");
    expect(statusText(307)).toBe("Temporary Redirect");
    expect(statusText(417)).toBe("Expectation Failed");
    expect(statusText(505)).toBe("HTTP Version not supported");
    expect(statusText(306)).toBe("Custom");
    expect(statusText(418)).toBe("Custom");
  });
});

describe("sendResponse", () => {
  it("writes the rendered bytes in one send", () => {
    const sent: Uint8Array[] = [];
    const socket: ITcpSocket = {
      send(data: Uint8Array) {
        sent.push(data.slice());
      },
      onData() {},
      onClose() {},
      onError() {},
      close() {},
    };

    sendResponse(socket, HttpResponse.json({ kind: "null" }, 202));

    expect(sent).toHaveLength(1);
    expect(decodeToString(sent[0])).toBe(
      "HTTP/1.1 202 Accepted\nContent-Type: application/json\nContent-Length: 4\n\nnull",
    );
  });
});
