/**
 * JSON API over the controller
 */

import {
  ExportFormatSchema,
  ExportRequestSchema,
  PartialSettingsSchema,
} from "@qr-studio/shared";
import { Hono } from "hono";
import { z } from "zod";
import type { QrController } from "../controller/QrController.js";
import { toArrayBuffer } from "./binary.js";

export interface QrApiDeps {
  controller: QrController;
}

const GenerateBodySchema = z.object({
  text: z.string(),
  settings: PartialSettingsSchema.optional(),
});

const CONTENT_TYPES = {
  PNG: "image/png",
  JPG: "image/jpeg",
} as const;

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

export function createQrApiRoutes(deps: QrApiDeps): Hono {
  const routes = new Hono();
  const { controller } = deps;

  // GET /api/state - Current controller snapshot
  routes.get("/state", (c) => {
    return c.json({ snapshot: controller.getSnapshot() });
  });

  // PUT /api/settings - Change draft settings without regenerating
  // Body: Partial<Settings>
  routes.put("/settings", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    const parsed = PartialSettingsSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: formatZodError(parsed.error) }, 400);
    }

    controller.updateSettings(parsed.data);
    return c.json({ snapshot: controller.getSnapshot() });
  });

  // POST /api/generate - Generate from text, settings default to the draft
  // Body: { text: string, settings?: Partial<Settings> }
  routes.post("/generate", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    const parsed = GenerateBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: formatZodError(parsed.error) }, 400);
    }

    controller.updateDraft(parsed.data);
    const result = controller.generateFromDraft();
    const snapshot = controller.getSnapshot();
    if (!result.ok) {
      return c.json(
        { error: result.error.toSummary(), snapshot },
        result.error.status,
      );
    }
    return c.json({ snapshot, image: snapshot.image });
  });

  // POST /api/export - Write the held image to disk
  // Body: { targetPath: string, format: "PNG" | "JPG" }
  routes.post("/export", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    const parsed = ExportRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: formatZodError(parsed.error) }, 400);
    }

    const result = await controller.onExportRequested(parsed.data);
    const snapshot = controller.getSnapshot();
    if (!result.ok) {
      return c.json(
        { error: result.error.toSummary(), snapshot },
        result.error.status,
      );
    }
    return c.json({ snapshot, export: result.value });
  });

  // GET /api/image?format=png|jpg - Full-size image bytes
  routes.get("/image", (c) => {
    const format = ExportFormatSchema.safeParse(
      (c.req.query("format") ?? "png").toUpperCase(),
    );
    if (!format.success) {
      return c.json({ error: "format must be png or jpg" }, 400);
    }

    const bytes = controller.renderImage(format.data);
    if (!bytes) {
      return c.json({ error: "No QR code generated yet" }, 409);
    }
    return c.body(toArrayBuffer(bytes), 200, {
      "Content-Type": CONTENT_TYPES[format.data],
      "Cache-Control": "no-store",
    });
  });

  return routes;
}
