import type { LogLevel } from "../logging/logger.js";

/**
 * `serial` serves one connection to completion before reading from the next;
 * `concurrent` serves every accepted connection as its data arrives.
 */
export type ConnectionMode = "serial" | "concurrent";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Default: 'serial' */
  connectionMode: ConnectionMode;
  /** Only dispatch to routes registered for the request's method. Default: false */
  enforceMethod: boolean;
  /** Default: 'info' */
  logLevel: LogLevel;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    connectionMode: "serial",
    enforceMethod: false,
    logLevel: "info",
  };
}

/**
 * Defaults overridden by PORT and HOST from the environment.
 */
export function configFromEnv(
  env: Readonly<Record<string, string | undefined>>,
): ServerConfig {
  const config = defaultConfig();
  if (env.PORT) {
    const port = Number.parseInt(env.PORT, 10);
    if (Number.isNaN(port) || port < 0 || port > 65535) {
      throw new Error(`Invalid PORT "${env.PORT}"`);
    }
    config.port = port;
  }
  if (env.HOST) {
    config.host = env.HOST;
  }
  return config;
}
