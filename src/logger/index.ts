import pino, { Logger, LevelWithSilent, TransportTargetOptions } from "pino";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

const LevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export interface LoggerSettings {
    level: LevelWithSilent;
    logFile?: string;
    pretty?: boolean;
}

export function resolveLogLevel(
    requested: string | undefined,
    env: string | undefined
): LevelWithSilent {
    const parsed = LevelSchema.safeParse(requested?.trim().toLowerCase());
    if (parsed.success) return parsed.data;

    return env === "test" ? "silent" : env === "development" ? "debug" : "info";
}

export function createLogger({ level, logFile, pretty = false }: LoggerSettings): Logger {
    const options = {
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid },
    };

    if (pretty) {
        const targets: TransportTargetOptions[] = [
            {
                target: "pino-pretty",
                level: "trace",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd HH:MM:ss",
                    ignore: "pid,hostname",
                    destination: 2,
                },
            },
        ];

        if (logFile) {
            targets.push({
                target: "pino/file",
                level: "trace",
                options: { destination: logFile, mkdir: true },
            });
        }

        return pino({ ...options, transport: { targets } });
    }

    // stdout carries the report; logs go to stderr
    if (logFile) {
        return pino(
            options,
            pino.multistream([
                { level: "trace", stream: process.stderr },
                { level: "trace", stream: pino.destination({ dest: logFile, mkdir: true, sync: true }) },
            ])
        );
    }

    return pino(options, process.stderr);
}

const env = process.env.NODE_ENV;

export const logger = createLogger({
    level: resolveLogLevel(process.env.LOG_LEVEL, env),
    logFile: process.env.WEATHER_LOG_FILE?.trim() || undefined,
    pretty: env === "development",
});
