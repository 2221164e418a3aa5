/**
 * Debug logging for the credibility analyzer.
 *
 * Every line goes to the console; with CR_DEBUG_LOG_FILE=true it is also
 * appended to CR_DEBUG_LOG_PATH (default `debug-analyzer.log` beside the
 * package.json above the working directory).
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

const MAX_PAYLOAD_CHARS = 8000;
const ROOT_SEARCH_DEPTH = 10;

interface DebugFileTarget {
  path: string;
  /** Set after the first failed write; the file is not retried */
  broken: boolean;
}

/**
 * Walk up from `startDir` to the nearest directory holding a package.json.
 * Falls back to `startDir` itself.
 */
export function findPackageRoot(startDir: string): string {
  let dir = startDir;
  for (let depth = 0; depth < ROOT_SEARCH_DEPTH; depth++) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return startDir;
}

// undefined: not yet read from the environment; null: file logging off
let fileTarget: DebugFileTarget | null | undefined;

function getFileTarget(): DebugFileTarget | null {
  if (fileTarget === undefined) {
    const enabled = (process.env.CR_DEBUG_LOG_FILE ?? "").toLowerCase() === "true";
    fileTarget = enabled
      ? {
          path: process.env.CR_DEBUG_LOG_PATH || path.join(findPackageRoot(process.cwd()), "debug-analyzer.log"),
          broken: false,
        }
      : null;
  }
  return fileTarget;
}

function renderPayload(data: unknown): string {
  let text: string;
  try {
    text = typeof data === "string" ? data : JSON.stringify(data, null, 2);
  } catch {
    // circular structures and BigInt
    text = "[unserializable]";
  }
  return text.length > MAX_PAYLOAD_CHARS ? `${text.slice(0, MAX_PAYLOAD_CHARS)}…[truncated]` : text;
}

/** `[timestamp] message | payload`, payload omitted when undefined */
export function formatLogLine(message: string, data?: unknown, timestamp = new Date().toISOString()): string {
  const head = `[${timestamp}] ${message}`;
  return data === undefined ? head : `${head} | ${renderPayload(data)}`;
}

export function debugLog(message: string, data?: unknown): void {
  const line = formatLogLine(message, data);
  console.log(line);

  const target = getFileTarget();
  if (!target || target.broken) return;

  fs.promises.appendFile(target.path, `${line}\n`).catch((err: unknown) => {
    if (target.broken) return;
    target.broken = true;
    console.warn(
      `[Debug] Cannot write ${target.path}, file logging stays off for this process:`,
      err instanceof Error ? err.message : String(err),
    );
  });
}
