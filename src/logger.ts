import { destination, pino, type Logger } from "pino";
import type { LogSettings } from "./types.js";

export type { Logger };

// The game screen owns stdout, so logging only happens when a file is named.
export function createLogger(settings: LogSettings): Logger {
  if (!settings.file) {
    return pino({ level: "silent" });
  }
  return pino(
    { name: "terminal-snake", level: settings.level },
    destination({ dest: settings.file, sync: true, mkdir: true }),
  );
}

export const silentLogger: Logger = pino({ level: "silent" });
