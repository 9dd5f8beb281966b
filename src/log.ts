import pino, { type Logger } from "pino";
import { loadConfig, type AppConfig } from "./config/index.js";

export function createLogger(settings: Pick<AppConfig, "logLevel" | "logPretty"> = loadConfig()): Logger {
    return pino({
        base: undefined,
        level: settings.logLevel,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
        transport: settings.logPretty ? {
            target: "pino-pretty",
            options: {
                translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
                colorize: false,
                ignore: "pid,hostname",
            },
        } : undefined,
    });
}

export const log = createLogger();
