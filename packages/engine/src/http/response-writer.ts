import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponse } from "./response.js";

/**
 * Render a response to wire bytes. The status line always says HTTP/1.1 and
 * lines end in a bare LF.
 */
export function renderResponse(response: HttpResponse): Uint8Array {
  const body = fromString(response.body);
  const lines: string[] = [
    `HTTP/1.1 ${response.status} ${response.statusText}`,
    `Content-Type: ${response.contentType}`,
    `Content-Length: ${body.length}`,
  ];
  for (const [key, value] of response.headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", "");
  return concat([fromString(lines.join("\n")), body]);
}

/**
 * Send a complete response over a socket.
 */
export function sendResponse(socket: ITcpSocket, response: HttpResponse): void {
  socket.send(renderResponse(response));
}
