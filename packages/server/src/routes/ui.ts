/**
 * HTML front end: the main window and its form posts.
 */

import { ExportFormatSchema, SettingsSchema } from "@qr-studio/shared";
import { Hono } from "hono";
import { z } from "zod";
import type { QrController } from "../controller/QrController.js";
import { renderPage } from "../ui/page.js";
import { toArrayBuffer } from "./binary.js";

export interface UiRoutesDeps {
  controller: QrController;
  previewSize: number;
}

const GenerateFormSchema = SettingsSchema.extend({
  text: z.string(),
});

// A blank path is left to the controller so it lands in the status bar
const ExportFormSchema = z.object({
  targetPath: z.string(),
  format: ExportFormatSchema,
});

export function createUiRoutes(deps: UiRoutesDeps): Hono {
  const routes = new Hono();
  const { controller, previewSize } = deps;

  // GET / - Main window
  routes.get("/", (c) => {
    return c.html(renderPage(controller.getSnapshot(), { previewSize }));
  });

  // POST /generate - Form: text, errorCorrectionLevel, moduleSize
  routes.post("/generate", async (c) => {
    const parsed = GenerateFormSchema.safeParse(await c.req.parseBody());
    if (!parsed.success) {
      return c.text(`Invalid settings: ${parsed.error.issues[0]?.message ?? "unknown"}`, 400);
    }

    const { text, ...settings } = parsed.data;
    // Failures are recorded on the controller and shown in the status bar
    controller.onGenerateRequested(text.trim(), settings);
    return c.redirect("/", 303);
  });

  // POST /export - Form: targetPath, format
  routes.post("/export", async (c) => {
    const parsed = ExportFormSchema.safeParse(await c.req.parseBody());
    if (!parsed.success) {
      return c.text(`Invalid export request: ${parsed.error.issues[0]?.message ?? "unknown"}`, 400);
    }

    await controller.onExportRequested(parsed.data);
    return c.redirect("/", 303);
  });

  // GET /preview.png - Scaled preview of the held image
  routes.get("/preview.png", (c) => {
    const png = controller.getPreviewPng();
    if (!png) {
      return c.text("No QR code generated yet", 404);
    }
    return c.body(toArrayBuffer(png), 200, {
      "Content-Type": "image/png",
      "Cache-Control": "no-store",
    });
  });

  return routes;
}
