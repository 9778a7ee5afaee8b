import pino, { Level, Logger, LoggerOptions } from "pino";

export type { Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export interface LoggingConfig {
  level: Level;
  file?: string;
}

export function createLogger(config: LoggingConfig): Logger {
  const options: LoggerOptions = { name: "run-uploader", level: config.level };
  if (!config.file) {
    return pino(options);
  }
  return pino(
    options,
    pino.multistream([
      { stream: process.stdout, level: config.level },
      { stream: pino.destination({ dest: config.file, mkdir: true, sync: true }), level: config.level }
    ])
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
