// Node adapter
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/node-socket.js";
// Config
export type { ConnectionMode, ServerConfig } from "./config/server-config.js";
export { configFromEnv, defaultConfig } from "./config/server-config.js";
// HTTP
export type { ParsedHttpRequest } from "./http/request-parser.js";
export {
  IncompleteRequestDataError,
  parseHttpRequest,
} from "./http/request-parser.js";
export type { HttpResponseInit } from "./http/response.js";
export { HttpResponse } from "./http/response.js";
export { renderResponse, sendResponse } from "./http/response-writer.js";
export type { HttpRequest, RequestHeader } from "./http/types.js";
export { getField, STATUS_TEXT, statusText } from "./http/types.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// JSON
export { JsonSyntaxError, UnsupportedTypeError } from "./json/errors.js";
export { formatJson, stringify } from "./json/json-formatter.js";
export { parseJson } from "./json/json-parser.js";
export type {
  JsonArray,
  JsonBool,
  JsonFloat,
  JsonInt,
  JsonKind,
  JsonNull,
  JsonObject,
  JsonString,
  JsonValue,
} from "./json/json-value.js";
export { fromJsonValue, Json, toJsonValue } from "./json/json-value.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  isLogLevel,
  parseLogLevel,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Router
export type {
  HttpMethod,
  RequestHandler,
  Route,
  RouteHandler,
  RouteMatch,
  RouteParams,
  RouterOptions,
} from "./router/router.js";
export { Router, splitPath } from "./router/router.js";
// Server
export type { DriverState } from "./server/connection-driver.js";
export { ConnectionDriver } from "./server/connection-driver.js";
export type {
  HttpServerEvents,
  HttpServerOptions,
} from "./server/http-server.js";
export { HttpServer, ServerStartError } from "./server/http-server.js";
export type { InMemorySocketFactoryOptions } from "./testing/in-memory-socket-factory.js";
export {
  InMemoryClient,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
// Utils
export {
  ByteBuffer,
  concat,
  decodeStrict,
  decodeToString,
  fromString,
} from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
