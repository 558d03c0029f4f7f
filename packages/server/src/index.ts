import { serve } from "@hono/node-server";
import { createApp, createController } from "./app.js";
import { openInBrowser } from "./browser.js";
import { loadConfig } from "./config.js";
import { initLogger } from "./logging/logger.js";

const config = loadConfig();

const logger = initLogger({
  level: config.logLevel,
  pretty: config.logPretty,
});

logger.info(
  { port: config.port, host: config.host, exportDir: config.exportDir },
  "Starting QR Studio",
);

// Created on startup, dropped on exit
const controller = createController(config);
const app = createApp({ controller, previewSize: config.previewSize });

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  },
  (info) => {
    const url = `http://${config.host}:${info.port}/`;
    logger.info({ port: info.port }, `QR Studio ready on ${url}`);
    if (config.openBrowser) {
      openInBrowser(url);
    }
  },
);

server.on("error", (error) => {
  logger.fatal({ err: error }, "Server failed to start");
  process.exit(1);
});

function shutdown() {
  logger.info("Shutting down QR Studio...");
  server.close(() => {
    logger.info("QR Studio stopped");
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
