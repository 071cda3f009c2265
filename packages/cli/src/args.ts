import {
  type ConnectionMode,
  type LogLevel,
  parseLogLevel,
  type ServerConfig,
} from "@strand/engine";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type CliCommand =
  | { kind: "serve"; config: ServerConfig }
  | { kind: "help" }
  | { kind: "version" };

export const HELP_TEXT = `
strand - minimal HTTP/1.1 server with a JSON codec

Usage: strand [options]

Options:
  --port, -p <port>      Port to listen on (default: 8080, or $PORT)
  --host, -H <host>      Host to bind (default: 127.0.0.1, or $HOST)
  --concurrent           Serve connections concurrently instead of one at a time
  --strict-methods       Only match routes registered for the request's method
  --log-level <level>    debug, info, warn or error (default: info)
  --quiet, -q            Suppress request logging
  --version, -v          Show version
  --help, -h             Show this help
`;

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(args: string[], base: ServerConfig): CliCommand {
  let port = base.port;
  let host = base.host;
  let connectionMode: ConnectionMode = base.connectionMode;
  let enforceMethod = base.enforceMethod;
  let logLevel: LogLevel = base.logLevel;
  let quiet = base.quiet;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      const raw = takeValue(args, ++i, arg);
      port = Number.parseInt(raw, 10);
      if (Number.isNaN(port) || port < 0 || port > 65535) {
        throw new CliUsageError(`Invalid port number: ${raw}`);
      }
    } else if (arg === "--host" || arg === "-H") {
      host = takeValue(args, ++i, arg);
    } else if (arg === "--concurrent") {
      connectionMode = "concurrent";
    } else if (arg === "--strict-methods") {
      enforceMethod = true;
    } else if (arg === "--log-level") {
      const raw = takeValue(args, ++i, arg);
      try {
        logLevel = parseLogLevel(raw);
      } catch (err) {
        throw new CliUsageError(err instanceof Error ? err.message : String(err));
      }
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return {
    kind: "serve",
    config: { port, host, connectionMode, enforceMethod, logLevel, quiet },
  };
}
