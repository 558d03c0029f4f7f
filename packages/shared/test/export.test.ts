import { describe, expect, it } from "vitest";
import {
  ExportRequestSchema,
  formatFromExtension,
  withFormatExtension,
} from "../src/export.js";

describe("formatFromExtension", () => {
  it("maps image extensions case-insensitively", () => {
    expect(formatFromExtension("shots/out.PNG")).toBe("PNG");
    expect(formatFromExtension("out.jpg")).toBe("JPG");
    expect(formatFromExtension("out.jpeg")).toBe("JPG");
  });

  it("returns null for other or missing extensions", () => {
    expect(formatFromExtension("out.gif")).toBeNull();
    expect(formatFromExtension("out")).toBeNull();
  });
});

describe("withFormatExtension", () => {
  it("appends the format extension when there is none", () => {
    expect(withFormatExtension("out", "PNG")).toBe("out.png");
    expect(withFormatExtension("dir.v2/out", "JPG")).toBe("dir.v2/out.jpg");
  });

  it("replaces a trailing dot", () => {
    expect(withFormatExtension("out.", "PNG")).toBe("out.png");
  });

  it("keeps an extension that matches the format", () => {
    expect(withFormatExtension("out.PNG", "PNG")).toBe("out.PNG");
    expect(withFormatExtension("photo.jpeg", "JPG")).toBe("photo.jpeg");
  });

  it("replaces an image extension naming the other format", () => {
    expect(withFormatExtension("qr-code.png", "JPG")).toBe("qr-code.jpg");
    expect(withFormatExtension("shots/out.jpeg", "PNG")).toBe("shots/out.png");
  });

  it("appends after an unrelated extension", () => {
    expect(withFormatExtension("release.v2", "PNG")).toBe("release.v2.png");
  });
});

describe("ExportRequestSchema", () => {
  it("trims the target path", () => {
    expect(
      ExportRequestSchema.parse({ targetPath: "  out.png ", format: "PNG" }),
    ).toEqual({ targetPath: "out.png", format: "PNG" });
  });

  it("rejects a blank target path", () => {
    const result = ExportRequestSchema.safeParse({
      targetPath: "   ",
      format: "PNG",
    });
    expect(result.success).toBe(false);
  });

  it("rejects unsupported formats", () => {
    expect(
      ExportRequestSchema.safeParse({ targetPath: "out.gif", format: "GIF" })
        .success,
    ).toBe(false);
  });
});
