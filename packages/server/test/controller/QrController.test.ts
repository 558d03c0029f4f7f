import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { PNG } from "pngjs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { QrController } from "../../src/controller/QrController.js";
import type { ImageWriter } from "../../src/export/exporter.js";
import {
  createImageGenerator,
  type ImageGenerator,
} from "../../src/qr/generator.js";

const URL_TEXT = "https://example.com";

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe("QrController", () => {
  let dir: string;
  let controller: QrController;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "qr-studio-controller-"));
    controller = new QrController({
      generator: createImageGenerator(),
      exportDir: dir,
    });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("starts idle with default settings", () => {
    expect(controller.state).toBe("IDLE");
    expect(controller.getSnapshot()).toEqual({
      state: "IDLE",
      text: "",
      settings: { errorCorrectionLevel: "MEDIUM", moduleSize: 10 },
      image: null,
      status: { level: "info", text: "Ready" },
      lastError: null,
    });
    expect(controller.getPreviewPng()).toBeNull();
    expect(controller.renderImage("PNG")).toBeNull();
  });

  describe("onGenerateRequested", () => {
    it("moves to GENERATED and describes the image", () => {
      const result = controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });

      expect(result.ok).toBe(true);
      const snapshot = controller.getSnapshot();
      expect(snapshot.state).toBe("GENERATED");
      expect(snapshot.image).toMatchObject({
        text: URL_TEXT,
        settings: { errorCorrectionLevel: "MEDIUM", moduleSize: 10 },
        version: 2,
        moduleCount: 25,
        width: 330,
        height: 330,
        revision: 1,
      });
      expect(snapshot.status).toEqual({
        level: "success",
        text: "Generated QR code for: https://example.com",
      });
    });

    it("truncates long text in the status line", () => {
      const text = "abcdefghijklmnopqrstuvwxyz0123456789";
      controller.onGenerateRequested(text, {
        errorCorrectionLevel: "LOW",
        moduleSize: 5,
      });

      expect(controller.getSnapshot().status.text).toBe(
        "Generated QR code for: abcdefghijklmnopqrstuvwxyz0123...",
      );
    });

    it("stays idle on empty input", () => {
      const result = controller.onGenerateRequested("   ", {
        errorCorrectionLevel: "HIGH",
        moduleSize: 12,
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("EmptyInputError");
      }
      const snapshot = controller.getSnapshot();
      expect(snapshot.state).toBe("IDLE");
      expect(snapshot.image).toBeNull();
      expect(snapshot.lastError).toEqual({
        kind: "EmptyInputError",
        message: "Please enter text or URL to generate QR code",
      });
      expect(snapshot.status).toEqual({
        level: "warning",
        text: "Please enter text or URL to generate QR code",
      });
    });

    it("keeps the previous image when a later generation fails", () => {
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });
      const result = controller.onGenerateRequested("x".repeat(3000), {
        errorCorrectionLevel: "HIGH",
        moduleSize: 10,
      });

      expect(result.ok).toBe(false);
      const snapshot = controller.getSnapshot();
      expect(snapshot.state).toBe("GENERATED");
      expect(snapshot.image?.text).toBe(URL_TEXT);
      expect(snapshot.image?.revision).toBe(1);
      expect(snapshot.lastError?.kind).toBe("EncodingError");
      expect(snapshot.status.level).toBe("error");
    });

    it("replaces the image on regeneration", () => {
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 5,
      });

      const snapshot = controller.getSnapshot();
      expect(snapshot.state).toBe("GENERATED");
      expect(snapshot.image?.width).toBe(165);
      expect(snapshot.image?.revision).toBe(2);
    });

    it("keeps a scaled preview", () => {
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });

      const preview = controller.getPreviewPng();
      expect(preview).not.toBeNull();
      if (preview) {
        const decoded = PNG.sync.read(preview);
        expect(decoded.width).toBe(250);
        expect(decoded.height).toBe(250);
      }
    });

    it("rethrows errors it does not own", () => {
      const generator: ImageGenerator = {
        generate: () => {
          throw new Error("boom");
        },
      };
      const broken = new QrController({ generator });

      expect(() =>
        broken.onGenerateRequested(URL_TEXT, {
          errorCorrectionLevel: "LOW",
          moduleSize: 5,
        }),
      ).toThrow("boom");
    });
  });

  describe("draft updates", () => {
    it("changes settings without regenerating", () => {
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });
      controller.updateSettings({ moduleSize: 20 });
      controller.updateDraft({
        text: "something else",
        settings: { errorCorrectionLevel: "HIGH" },
      });

      const snapshot = controller.getSnapshot();
      expect(snapshot.text).toBe("something else");
      expect(snapshot.settings).toEqual({
        errorCorrectionLevel: "HIGH",
        moduleSize: 20,
      });
      expect(snapshot.image?.settings).toEqual({
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });
      expect(snapshot.image?.revision).toBe(1);
    });

    it("generates from the draft on request", () => {
      controller.updateDraft({
        text: URL_TEXT,
        settings: { errorCorrectionLevel: "HIGH", moduleSize: 5 },
      });
      const result = controller.generateFromDraft();

      expect(result.ok).toBe(true);
      // (29 + 2 * 4) * 5
      expect(controller.getSnapshot().image?.width).toBe(185);
    });
  });

  describe("onExportRequested", () => {
    it("refuses to export before generation and writes nothing", async () => {
      const result = await controller.onExportRequested({
        targetPath: "out.png",
        format: "PNG",
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("NoImageError");
      }
      expect(await exists(path.join(dir, "out.png"))).toBe(false);
      expect(controller.getSnapshot().state).toBe("IDLE");
      expect(controller.getSnapshot().status).toEqual({
        level: "warning",
        text: "Generate a QR code first before saving",
      });
    });

    it("writes a valid PNG after generation", async () => {
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });
      const result = await controller.onExportRequested({
        targetPath: "out.png",
        format: "PNG",
      });

      const target = path.join(dir, "out.png");
      expect(result).toEqual({
        ok: true,
        value: {
          path: target,
          format: "PNG",
          bytes: (await fs.readFile(target)).length,
        },
      });
      expect(PNG.sync.read(await fs.readFile(target)).width).toBe(330);
      expect(controller.getSnapshot().status).toEqual({
        level: "success",
        text: `Saved to: ${target}`,
      });
    });

    it("exports the image as generated, not the changed draft", async () => {
      controller.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });
      controller.updateSettings({ moduleSize: 20, errorCorrectionLevel: "HIGH" });

      const result = await controller.onExportRequested({
        targetPath: "stale.png",
        format: "PNG",
      });

      expect(result.ok).toBe(true);
      const decoded = PNG.sync.read(
        await fs.readFile(path.join(dir, "stale.png")),
      );
      expect(decoded.width).toBe(330);
    });

    it("surfaces write failures and keeps the image", async () => {
      const writer: ImageWriter = {
        write: async () => {
          throw new Error("permission denied");
        },
      };
      const failing = new QrController({
        generator: createImageGenerator(),
        writer,
        exportDir: dir,
      });
      failing.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });

      const result = await failing.onExportRequested({
        targetPath: "out.png",
        format: "PNG",
      });

      expect(result.ok).toBe(false);
      const snapshot = failing.getSnapshot();
      expect(snapshot.state).toBe("GENERATED");
      expect(snapshot.lastError).toEqual({
        kind: "WriteError",
        message: "Could not save file: permission denied",
      });
      expect(snapshot.status.level).toBe("error");
    });

    it("writes the image held when the export started", async () => {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const written: Buffer[] = [];
      const writer: ImageWriter = {
        write: async (_filePath, data) => {
          await gate;
          written.push(data);
        },
      };
      const slow = new QrController({
        generator: createImageGenerator(),
        writer,
        exportDir: dir,
      });
      slow.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 10,
      });

      const pending = slow.onExportRequested({
        targetPath: "out.png",
        format: "PNG",
      });
      slow.onGenerateRequested(URL_TEXT, {
        errorCorrectionLevel: "MEDIUM",
        moduleSize: 20,
      });
      release();
      await pending;

      expect(written).toHaveLength(1);
      const first = written[0];
      expect(first && PNG.sync.read(first).width).toBe(330);
    });
  });

  it("renders the full image in either format", () => {
    controller.onGenerateRequested(URL_TEXT, {
      errorCorrectionLevel: "MEDIUM",
      moduleSize: 10,
    });

    const png = controller.renderImage("PNG");
    const jpg = controller.renderImage("JPG");
    expect(png && PNG.sync.read(png).width).toBe(330);
    expect(jpg && [...jpg.subarray(0, 2)]).toEqual([0xff, 0xd8]);
  });
});
