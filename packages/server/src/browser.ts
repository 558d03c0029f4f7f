import { spawn } from "node:child_process";
import { getLogger } from "./logging/logger.js";

/**
 * Platform command that opens a URL with the default handler.
 */
export function getOpenCommand(
  url: string,
  platform: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
  if (platform === "darwin") {
    return { command: "open", args: [url] };
  }
  if (platform === "win32") {
    // The empty string is the window title argument of `start`
    return { command: "cmd", args: ["/c", "start", "", url] };
  }
  return { command: "xdg-open", args: [url] };
}

/**
 * Open the UI in the default browser. Failure only logs: the server keeps
 * running and the URL is printed for the user.
 */
export function openInBrowser(url: string): void {
  const logger = getLogger();
  const { command, args } = getOpenCommand(url);
  try {
    const child = spawn(command, args, { detached: true, stdio: "ignore" });
    child.on("error", (error) => {
      logger.warn({ err: error, url }, "Could not open browser");
    });
    child.unref();
  } catch (error) {
    logger.warn({ err: error, url }, "Could not open browser");
  }
}
