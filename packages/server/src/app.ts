import { Hono } from "hono";
import type { Config } from "./config.js";
import { QrController } from "./controller/QrController.js";
import { getLogger } from "./logging/logger.js";
import { createImageGenerator } from "./qr/generator.js";
import { createQrApiRoutes } from "./routes/api.js";
import { createUiRoutes } from "./routes/ui.js";

export interface AppDeps {
  controller: QrController;
  previewSize: number;
}

/**
 * Build the controller from configuration. One instance lives for the
 * whole process.
 */
export function createController(config: Config): QrController {
  return new QrController({
    generator: createImageGenerator({
      border: config.border,
      foreground: config.foreground,
      background: config.background,
    }),
    exportDir: config.exportDir,
    previewSize: config.previewSize,
    jpegQuality: config.jpegQuality,
    initialSettings: {
      errorCorrectionLevel: config.defaultErrorCorrectionLevel,
      moduleSize: config.defaultModuleSize,
    },
  });
}

export function createApp(deps: AppDeps): Hono {
  const logger = getLogger().child({ component: "http" });
  const app = new Hono();

  app.route("/api", createQrApiRoutes({ controller: deps.controller }));
  app.route(
    "/",
    createUiRoutes({
      controller: deps.controller,
      previewSize: deps.previewSize,
    }),
  );

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path }, "Unhandled request error");
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
