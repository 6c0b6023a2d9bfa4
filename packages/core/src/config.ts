import { format } from "node:util";
import { ConfigurationError } from "./errors.js";
import type { PeriodInput, UpdaterConfig } from "./types.js";

const FORMAT_DIRECTIVES = new Set(["s", "d", "i", "f", "j", "o", "O", "c"]);

/**
 * Parse an untyped host config record. Missing keys stay undefined;
 * present keys of the wrong type are rejected.
 */
export function parseUpdaterConfig(raw: Record<string, unknown> | undefined): UpdaterConfig {
  if (!raw) return {};
  const config: UpdaterConfig = {
    period: readNumber(raw, "period"),
    hardwareId: readString(raw, "hardwareId"),
    nodeName: readString(raw, "nodeName"),
    verbose: readBoolean(raw, "verbose"),
    isolateTaskFailures: readBoolean(raw, "isolateTaskFailures"),
    tickIntervalMs: readNumber(raw, "tickIntervalMs"),
  };
  if (config.period !== undefined) toPeriodMs(config.period);
  if (config.tickIntervalMs !== undefined) assertPositive("tickIntervalMs", config.tickIntervalMs);
  return config;
}

/** Period in milliseconds. Bare numbers are seconds. */
export function toPeriodMs(period: PeriodInput): number {
  const ms = typeof period === "number" ? period * 1000 : period.milliseconds;
  assertPositive("period", ms);
  return ms;
}

/**
 * printf-style hardware id. Directives are those of util.format; an unknown
 * directive, or fewer arguments than directives, is a ConfigurationError.
 */
export function formatHardwareId(fmt: string, args: readonly unknown[]): string {
  let expected = 0;
  for (let i = 0; i < fmt.length; i++) {
    if (fmt.charAt(i) !== "%") continue;
    const next = fmt.charAt(i + 1);
    i++;
    if (next === "%") continue;
    if (!FORMAT_DIRECTIVES.has(next)) {
      throw new ConfigurationError(`hardware id format "${fmt}": unsupported directive "%${next}"`);
    }
    expected++;
  }
  if (args.length < expected) {
    throw new ConfigurationError(
      `hardware id format "${fmt}": expected ${expected} argument(s), got ${args.length}`,
    );
  }
  return format(fmt, ...args);
}

// ─── Internal ──────────────────────────────────────────────────────────────

function assertPositive(key: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive number, got ${value}`);
  }
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number") throw wrongType(key, "number", value);
  return value;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw wrongType(key, "string", value);
  return value;
}

function readBoolean(raw: Record<string, unknown>, key: string): boolean | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw wrongType(key, "boolean", value);
  return value;
}

function wrongType(key: string, expected: string, value: unknown): ConfigurationError {
  return new ConfigurationError(`${key} must be a ${expected}, got ${typeof value}`);
}
