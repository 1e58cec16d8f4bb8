import pino, { type Logger } from "pino";
import { DEFAULT_CONFIG, type LogConfig } from "@capbridge/shared";

export function createLogger(config: LogConfig = DEFAULT_CONFIG.log): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }
  return pino({ level: config.level });
}
