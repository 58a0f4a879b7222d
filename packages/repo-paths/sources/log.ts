import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
};

const SERVICE = "repo-paths";

const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    const config = resolveLogConfig(overrides);
    rootLogger = buildLogger(config);
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("REPO_PATHS_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination =
        overrides.destination ?? envValue("REPO_PATHS_LOG_DEST") ?? envValue("LOG_DEST") ?? "stderr";
    let format =
        overrides.format ??
        parseFormat(envValue("REPO_PATHS_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (process.stderr.isTTY ? "pretty" : "json");

    // Files always get machine-readable lines.
    if (!isStdDestination(destination)) {
        format = "json";
    }

    return { level, format, destination };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: SERVICE },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                ignore: "pid,hostname,service",
                messageFormat: "[{module}] {msg}",
                destination: config.destination === "stdout" ? 1 : 2
            });
            return pino(options, prettyStream);
        }
    }

    return destination ? pino(options, destination) : pino(options);
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }

    if (destination === "stderr") {
        return pino.destination(2);
    }

    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function normalizeModule(moduleName?: string): string {
    if (typeof moduleName !== "string") {
        return "unknown";
    }
    const trimmed = moduleName.trim();
    return trimmed.length > 0 ? trimmed : "unknown";
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    if (normalized === "pretty" || normalized === "json") {
        return normalized;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
