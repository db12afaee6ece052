// src/config.ts
// Process-wide logging configuration, resolved from an environment bag and
// adjustable at run time. Paths and thresholds are read at the next sink open;
// the file/console flags are read when a MessageLog is constructed.

import type { ConsoleFormat } from './types';

export interface LoggingConfig {
    /** Message log path. Default: 'output.log' */
    outputFilePath: string;
    /** Scope tracer path. Default: 'diagnostics.log' */
    diagnosticsFilePath: string;
    /** Default `toFile` of new MessageLog instances. Default: true */
    logToFile: boolean;
    /** Default `toConsole` of new MessageLog instances. Default: true */
    logToConsole: boolean;
    /** Rotation threshold of the message log, checked at open. Default: 5 MiB */
    outputMaxBytes: number;
    /** Rotation threshold of the diagnostics log, checked at open. Default: 2 MiB */
    diagnosticsMaxBytes: number;
    /** What the console echo contains. Default: 'message' */
    consoleFormat: ConsoleFormat;
}

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: Readonly<LoggingConfig> = Object.freeze({
    outputFilePath: 'output.log',
    diagnosticsFilePath: 'diagnostics.log',
    logToFile: true,
    logToConsole: true,
    outputMaxBytes: 5 * 1024 * 1024,
    diagnosticsMaxBytes: 2 * 1024 * 1024,
    consoleFormat: 'message',
});

/* ------------------------------- Env helpers ------------------------------- */

/**
 * Parse a boolean flag.
 * Accepts `1|true|yes|on` and `0|false|no|off`; anything else is `undefined`.
 */
export function parseFlag(s?: string): boolean | undefined {
    switch (s?.trim().toLowerCase()) {
        case '1': case 'true': case 'yes': case 'on': return true;
        case '0': case 'false': case 'no': case 'off': return false;
    }
    return undefined;
}

/** Parse a non-negative integer byte count; `undefined` if unparsable. */
export function parseBytes(s?: string): number | undefined {
    if (!s || !/^\s*\d+\s*$/.test(s)) return undefined;
    const n = Number(s);
    return Number.isSafeInteger(n) ? n : undefined;
}

function parseConsoleFormat(s?: string): ConsoleFormat | undefined {
    const v = s?.trim().toLowerCase();
    return v === 'message' || v === 'line' ? v : undefined;
}

function nonEmpty(s?: string): string | undefined {
    const v = s?.trim();
    return v ? v : undefined;
}

/**
 * Resolve a config from the environment bag, falling back to defaults per key:
 * - `LOG_OUTPUT_FILE`, `LOG_DIAGNOSTICS_FILE`
 * - `LOG_TO_FILE`, `LOG_TO_CONSOLE`
 * - `LOG_OUTPUT_MAX_BYTES`, `LOG_DIAGNOSTICS_MAX_BYTES`
 * - `LOG_CONSOLE_FORMAT=message|line`
 */
export function resolveConfig(env?: Env): LoggingConfig {
    return {
        outputFilePath: nonEmpty(env?.LOG_OUTPUT_FILE) ?? DEFAULT_CONFIG.outputFilePath,
        diagnosticsFilePath: nonEmpty(env?.LOG_DIAGNOSTICS_FILE) ?? DEFAULT_CONFIG.diagnosticsFilePath,
        logToFile: parseFlag(env?.LOG_TO_FILE) ?? DEFAULT_CONFIG.logToFile,
        logToConsole: parseFlag(env?.LOG_TO_CONSOLE) ?? DEFAULT_CONFIG.logToConsole,
        outputMaxBytes: parseBytes(env?.LOG_OUTPUT_MAX_BYTES) ?? DEFAULT_CONFIG.outputMaxBytes,
        diagnosticsMaxBytes: parseBytes(env?.LOG_DIAGNOSTICS_MAX_BYTES) ?? DEFAULT_CONFIG.diagnosticsMaxBytes,
        consoleFormat: parseConsoleFormat(env?.LOG_CONSOLE_FORMAT) ?? DEFAULT_CONFIG.consoleFormat,
    };
}

/* ------------------------------ Process state ------------------------------ */

const processEnv = (): Env | undefined => (typeof process !== 'undefined' ? process.env : undefined);

let current: LoggingConfig = resolveConfig(processEnv());

/** Snapshot of the current process-wide config. */
export function getConfig(): LoggingConfig {
    return { ...current };
}

/** Merge `patch` into the process-wide config; returns the new snapshot. */
export function configure(patch: Partial<LoggingConfig>): LoggingConfig {
    current = {
        outputFilePath: patch.outputFilePath ?? current.outputFilePath,
        diagnosticsFilePath: patch.diagnosticsFilePath ?? current.diagnosticsFilePath,
        logToFile: patch.logToFile ?? current.logToFile,
        logToConsole: patch.logToConsole ?? current.logToConsole,
        outputMaxBytes: patch.outputMaxBytes ?? current.outputMaxBytes,
        diagnosticsMaxBytes: patch.diagnosticsMaxBytes ?? current.diagnosticsMaxBytes,
        consoleFormat: patch.consoleFormat ?? current.consoleFormat,
    };
    return getConfig();
}

/** Re-resolve from `env` (default: `process.env`), discarding earlier `configure()` calls. */
export function resetConfig(env: Env | undefined = processEnv()): LoggingConfig {
    current = resolveConfig(env);
    return getConfig();
}
