import type { ServerConfig } from "../config/server-config.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import type { RequestHandler } from "../router/router.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { ConnectionDriver } from "./connection-driver.js";

export interface HttpServerOptions {
  socketFactory: ISocketFactory;
  handler: RequestHandler;
  config: ServerConfig;
  logger?: Logger;
}

export type HttpServerEvents = {
  listening: [port: number];
  connect: [connectionId: number];
  disconnect: [connectionId: number];
  error: [err: Error];
  close: [];
};

export class ServerStartError extends Error {
  readonly code = "SERVER_START_FAILED";

  constructor(host: string, port: number, cause: Error) {
    super(`Failed to listen on ${host}:${port}: ${cause.message}`, { cause });
    this.name = "ServerStartError";
  }
}

interface Connection {
  readonly id: number;
  readonly socket: ITcpSocket;
  readonly driver: ConnectionDriver;
  /** Chunks that arrived while the connection was waiting its turn. */
  backlog: Uint8Array[];
  active: boolean;
  closed: boolean;
}

/**
 * Accepts connections and runs one ConnectionDriver per connection.
 *
 * In `serial` mode a connection is served until the peer closes it before the
 * next one is read from; anything a waiting peer sends is held back and
 * replayed in order. In `concurrent` mode every connection is served as data
 * arrives. In both modes the request handler is the only shared state.
 */
export class HttpServer extends EventEmitter<HttpServerEvents> {
  private socketFactory: ISocketFactory;
  private handler: RequestHandler;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private connections: Set<Connection> = new Set();
  private waiting: Connection[] = [];
  private serving: Connection | null = null;
  private nextConnectionId = 1;

  constructor(options: HttpServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.handler = options.handler;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        const socket = this.socketFactory.wrapTcpSocket(rawSocket);
        this.handleConnection(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(new ServerStartError(this.config.host, this.config.port, err));
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;
      this.waiting = [];
      this.serving = null;

      for (const connection of [...this.connections]) {
        connection.socket.close();
        this.finish(connection);
      }

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private handleConnection(socket: ITcpSocket): void {
    const id = this.nextConnectionId++;
    const connection: Connection = {
      id,
      socket,
      driver: new ConnectionDriver({
        handler: this.handler,
        logger: this.logger,
        connectionId: id,
        logRequests: !this.config.quiet,
      }),
      backlog: [],
      active: false,
      closed: false,
    };
    this.connections.add(connection);

    socket.onData((data) => this.receive(connection, data));
    socket.onClose(() => this.finish(connection));
    socket.onError((err) => {
      this.logger.debug(`Connection #${id} error: ${err.message}`);
      this.finish(connection);
    });

    const addr = socket.remoteAddress ?? "?";
    this.logger.debug(`Client connected #${id} (${addr})`);
    this.emit("connect", id);

    if (this.config.connectionMode === "concurrent" || !this.serving) {
      this.activate(connection);
    } else {
      socket.pause?.();
      this.waiting.push(connection);
      this.logger.debug(
        `Connection #${id} queued behind #${this.serving.id}`,
      );
    }
  }

  private activate(connection: Connection): void {
    connection.active = true;
    if (this.config.connectionMode === "serial") {
      this.serving = connection;
    }

    const backlog = connection.backlog;
    connection.backlog = [];
    for (const chunk of backlog) {
      this.serve(connection, chunk);
    }
    if (!connection.closed) {
      connection.socket.resume?.();
    }
  }

  private receive(connection: Connection, data: Uint8Array): void {
    if (connection.closed) return;
    if (!connection.active) {
      connection.backlog.push(data);
      return;
    }
    this.serve(connection, data);
  }

  private serve(connection: Connection, data: Uint8Array): void {
    if (connection.closed) return;
    if (data.length === 0) {
      // zero-length read: end of stream
      connection.socket.close();
      this.finish(connection);
      return;
    }

    const reply = connection.driver.handleChunk(data);
    if (reply.length > 0) {
      connection.socket.send(reply);
    }
  }

  private finish(connection: Connection): void {
    if (connection.closed) return;
    connection.closed = true;
    connection.backlog = [];
    connection.driver.end();
    this.connections.delete(connection);
    this.waiting = this.waiting.filter((queued) => queued !== connection);

    this.logger.debug(`Client closed #${connection.id}`);
    this.emit("disconnect", connection.id);

    if (this.serving === connection) {
      this.serving = null;
      const next = this.waiting.shift();
      if (next) {
        this.activate(next);
      }
    }
  }
}
