import { NodeSocketFactory } from "../adapters/node/node-socket.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import type { RequestHandler } from "../router/router.js";
import { HttpServer } from "../server/http-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  handler: RequestHandler;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): HttpServer {
  return new HttpServer({
    socketFactory: new NodeSocketFactory(),
    handler: options.handler,
    config: options.config,
    logger: options.logger,
  });
}
