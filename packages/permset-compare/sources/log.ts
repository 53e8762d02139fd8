import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";

export type LogConfig = {
    level: string;
    format: LogFormat;
    service: string;
};

const VALID_FORMATS = new Set<LogFormat>(["pretty", "json"]);
const MODULE_WIDTH = 12;
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

/**
 * Resolves logger settings from overrides and environment.
 * Logs always go to stderr: stdout carries command output.
 */
export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const level =
        overrides.level ??
        envValue("PERMSET_COMPARE_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : "warn");
    const format =
        overrides.format ??
        parseFormat(envValue("PERMSET_COMPARE_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (process.stderr.isTTY ? "pretty" : "json");
    const service = overrides.service ?? "permset-compare";

    return { level, format, service };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                ignore: "pid,hostname,service,module",
                messageFormat: formatPrettyMessage,
                destination: 2
            });
            return pino(options, prettyStream);
        }
    }

    return pino(options, pino.destination(2));
}

export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    return `[${module.padEnd(MODULE_WIDTH, " ")}] ${message}`;
}

function normalizeModule(moduleName?: string): string {
    if (typeof moduleName !== "string") {
        return "unknown";
    }
    const trimmed = moduleName.trim();
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    for (const format of VALID_FORMATS) {
        if (format === normalized) {
            return format;
        }
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

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
