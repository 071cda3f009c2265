import {
  basicLogger,
  configFromEnv,
  createNodeServer,
  filteredLogger,
  prefixedLogger,
} from "@strand/engine";
import { CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { createSampleRouter } from "./routes.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  let command: ReturnType<typeof parseArgs>;
  try {
    command = parseArgs(process.argv.slice(2), configFromEnv(process.env));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }

  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return;
  }

  const { config } = command;
  const logger = prefixedLogger(
    "strand",
    filteredLogger(config.logLevel, basicLogger()),
  );

  const server = createNodeServer({
    config,
    handler: createSampleRouter({ enforceMethod: config.enforceMethod }),
    logger,
  });

  const port = await server.start();
  logger.info(
    `Listening on http://${config.host}:${port} (${config.connectionMode} connections)`,
  );

  const shutdown = () => {
    logger.info("Shutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
