type Level = "info" | "debug" | "warn" | "error";

const PREFIX = "[resolver]";

let quiet = false;

/** Silences info output (warnings and errors still print). */
export function setQuiet(value: boolean) {
  quiet = value;
}

function log(level: Level, ...args: unknown[]) {
  switch (level) {
    case "debug":
      console.debug(PREFIX, ...args);
      break;
    case "warn":
      console.warn(PREFIX, ...args);
      break;
    case "error":
      console.error(PREFIX, ...args);
      break;
    default:
      if (quiet) return;
      console.log(PREFIX, ...args);
  }
}

export function logInfo(...args: unknown[]) {
  log("info", ...args);
}

export function logDebug(enabled: boolean, ...args: unknown[]) {
  if (!enabled) return;
  log("debug", ...args);
}

export function logWarn(...args: unknown[]) {
  log("warn", ...args);
}

export function logError(...args: unknown[]) {
  log("error", ...args);
}
