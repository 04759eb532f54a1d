import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type LoggerOptions } from "pino";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const LOG_FILE = process.env.LOG_FILE;

function isLevel(value: string): value is pino.Level {
  return Object.hasOwn(pino.levels.values, value);
}

// Build the destination stream
function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const streamLevel: pino.Level = isLevel(LOG_LEVEL) ? LOG_LEVEL : "info";

  // Mirror to stdout and file
  const streams: pino.StreamEntry[] = [
    { level: streamLevel, stream: process.stdout },
    {
      level: streamLevel,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const feedLogger = logger.child({ module: "feed" });
export const storeLogger = logger.child({ module: "store" });
export const syncLogger = logger.child({ module: "sync" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
