/**
 * Server-rendered main window. Plain forms, no client script: every action
 * posts back and redirects to "/".
 */

import {
  type ControllerSnapshot,
  ERROR_CORRECTION_LABELS,
  ERROR_CORRECTION_LEVELS,
  EXPORT_FORMATS,
  EXPORT_FORMAT_EXTENSIONS,
  MODULE_SIZE_MAX,
  MODULE_SIZE_MIN,
} from "@qr-studio/shared";
import { html, raw } from "hono/html";

export interface PageOptions {
  previewSize: number;
}

const STYLES = `
  body { font-family: Arial, sans-serif; font-size: 14px; margin: 0; background: #f4f4f4; }
  main { width: 460px; margin: 24px auto; padding: 20px; background: #fff; border: 1px solid #ccc; }
  h1 { font-size: 20px; text-align: center; margin: 0 0 20px; }
  fieldset { margin: 0 0 12px; border: 1px solid #ccc; }
  textarea { width: 100%; box-sizing: border-box; }
  .row { display: flex; justify-content: space-between; align-items: center; margin: 4px 0; }
  .preview { display: flex; align-items: center; justify-content: center; min-height: 260px; }
  .status { border: 1px inset #ccc; padding: 4px 6px; margin-top: 10px; }
  .status.warning { color: #8a6d00; }
  .status.error { color: #b00020; }
  .status.success { color: #1b5e20; }
`;

export function renderPage(snapshot: ControllerSnapshot, options: PageOptions) {
  const { settings, image, status } = snapshot;

  const levelOptions = ERROR_CORRECTION_LEVELS.map(
    (level) =>
      html`<option value="${level}"${settings.errorCorrectionLevel === level ? " selected" : ""}>${ERROR_CORRECTION_LABELS[level]}</option>`,
  );
  const formatOptions = EXPORT_FORMATS.map(
    (format) =>
      html`<option value="${format}">${format} (*${EXPORT_FORMAT_EXTENSIONS[format]})</option>`,
  );

  const preview = image
    ? html`<img src="/preview.png?v=${image.revision}" width="${options.previewSize}" height="${options.previewSize}" alt="QR code preview">`
    : html`<span>QR code will appear here</span>`;

  return html`<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>QR Code Generator</title>
<style>${raw(STYLES)}</style>
</head>
<body>
<main>
<h1>QR Code Generator</h1>
<form method="post" action="/generate">
<fieldset>
<legend>Input</legend>
<label for="text">Enter text or URL:</label>
<textarea id="text" name="text" rows="3">${snapshot.text}</textarea>
</fieldset>
<fieldset>
<legend>Options</legend>
<div class="row"><label for="errorCorrectionLevel">Error Correction:</label>
<select id="errorCorrectionLevel" name="errorCorrectionLevel">${levelOptions}</select></div>
<div class="row"><label for="moduleSize">Size:</label>
<input id="moduleSize" name="moduleSize" type="range" min="${MODULE_SIZE_MIN}" max="${MODULE_SIZE_MAX}" step="1" value="${settings.moduleSize}"></div>
</fieldset>
<button type="submit">Generate QR Code</button>
</form>
<form method="post" action="/export">
<fieldset>
<legend>Save Image</legend>
<div class="row"><label for="targetPath">File:</label>
<input id="targetPath" name="targetPath" type="text" value="qr-code.png" required></div>
<div class="row"><label for="format">Format:</label>
<select id="format" name="format">${formatOptions}</select></div>
<button type="submit"${image ? "" : " disabled"}>Save Image</button>
</fieldset>
</form>
<fieldset>
<legend>Preview</legend>
<div class="preview">${preview}</div>
</fieldset>
<div class="status ${status.level}" role="status">${status.text}</div>
</main>
</body>
</html>`;
}
