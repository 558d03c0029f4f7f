#!/usr/bin/env node

/**
 * CLI entry point for qr-studio
 *
 * Usage:
 *   qr-studio                     # Start the UI and open it in the browser
 *   qr-studio --help              # Show help
 *   qr-studio --version           # Show version
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const MINIMUM_NODE_VERSION = 20;

/**
 * Check if Node.js version meets minimum requirements.
 * Exits with error if version is too low.
 */
function checkNodeVersion(): void {
  const currentVersion = process.versions.node;
  const majorVersion = Number.parseInt(currentVersion.split(".")[0] ?? "0", 10);

  if (majorVersion < MINIMUM_NODE_VERSION) {
    console.error(`Error: Node.js ${MINIMUM_NODE_VERSION}+ is required.`);
    console.error(`Current version: ${currentVersion}`);
    process.exit(1);
  }
}

function showHelp(): void {
  console.log(`
qr-studio - Turn text into QR code images, preview them and save as PNG or JPG

USAGE:
  qr-studio [OPTIONS]

OPTIONS:
  --help, -h            Show this help message
  --version, -v         Show version number
  --port <number>       UI server port (default: 3410)
  --host <address>      Host/interface to bind to (default: 127.0.0.1)
  --no-open             Do not open the browser on startup

ENVIRONMENT VARIABLES:
  PORT                          UI server port (default: 3410)
  HOST                          Host/interface to bind (default: 127.0.0.1)
  OPEN_BROWSER                  Open the UI on startup (default: true)
  QR_EXPORT_DIR                 Base directory for relative save paths (default: cwd)
  QR_BORDER                     Quiet zone in modules (default: 4)
  QR_PREVIEW_SIZE               Preview size in pixels (default: 250)
  QR_FOREGROUND, QR_BACKGROUND  Module and background colours (#rrggbb)
  QR_JPEG_QUALITY               JPEG quality 1-100 (default: 90)
  QR_DEFAULT_MODULE_SIZE        Initial module size 5-20 (default: 10)
  QR_DEFAULT_ERROR_CORRECTION   LOW, MEDIUM, QUARTILE or HIGH (default: MEDIUM)
  LOG_LEVEL                     Log level: fatal, error, warn, info, debug, trace
  LOG_PRETTY                    Pretty console logs (default: true)

EXAMPLES:
  # Start with defaults
  qr-studio

  # Save relative paths under ~/Pictures
  QR_EXPORT_DIR=~/Pictures qr-studio
`);
}

function getVersion(): string {
  try {
    // Read package.json from the package root
    const packageJsonPath = path.resolve(__dirname, "../package.json");
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(packageJsonPath, "utf-8"),
    );
    if (
      packageJson &&
      typeof packageJson === "object" &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

// Parse command line arguments
const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  showHelp();
  process.exit(0);
}

if (args.includes("--version") || args.includes("-v")) {
  console.log(`qr-studio v${getVersion()}`);
  process.exit(0);
}

// Parse --port option
const portIndex = args.indexOf("--port");
if (portIndex !== -1) {
  const portValue = args[portIndex + 1];
  if (!portValue || portValue.startsWith("-")) {
    console.error("Error: --port requires a value (e.g., --port 8000)");
    process.exit(1);
  }
  const portNum = Number.parseInt(portValue, 10);
  if (Number.isNaN(portNum) || portNum < 1 || portNum > 65535) {
    console.error("Error: --port must be a valid port number (1-65535)");
    process.exit(1);
  }
  process.env.PORT = portValue;
  args.splice(portIndex, 2);
}

// Parse --host option
const hostIndex = args.indexOf("--host");
if (hostIndex !== -1) {
  const hostValue = args[hostIndex + 1];
  if (!hostValue || hostValue.startsWith("-")) {
    console.error("Error: --host requires a value (e.g., --host 0.0.0.0)");
    process.exit(1);
  }
  process.env.HOST = hostValue;
  args.splice(hostIndex, 2);
}

// Parse --no-open flag
const noOpenIndex = args.indexOf("--no-open");
if (noOpenIndex !== -1) {
  process.env.OPEN_BROWSER = "false";
  args.splice(noOpenIndex, 1);
}

// If there are unknown arguments, show error and help
if (args.length > 0) {
  console.error(`Error: Unknown arguments: ${args.join(" ")}`);
  console.error("");
  console.error("Run 'qr-studio --help' for usage information.");
  process.exit(1);
}

checkNodeVersion();

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = "production";
}

runServer();

/**
 * Start the server by importing the main module. A missing dependency
 * surfaces here as a failed import.
 */
function runServer(): void {
  import("./index.js").catch((error: unknown) => {
    console.error("Failed to start QR Studio:", error);
    process.exit(1);
  });
}
