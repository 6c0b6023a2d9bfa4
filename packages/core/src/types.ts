// ─── Status Levels ───────────────────────────────────────────────────────────

export type StatusLevel = "ok" | "warn" | "error" | "stale";

/** Severity order. Stale outranks error. */
export const LEVEL_RANK: Record<StatusLevel, number> = {
  ok: 0,
  warn: 1,
  error: 2,
  stale: 3,
};

// ─── Published Reports ───────────────────────────────────────────────────────

export type StatusField = {
  readonly key: string;
  readonly value: string;
};

export type StatusSnapshot = {
  readonly name: string;
  readonly level: StatusLevel;
  readonly message: string;
  readonly hardwareId: string;
  readonly fields: readonly StatusField[];
};

export type BatchKind = "update" | "placeholder" | "broadcast";

export type DiagnosticBatch = {
  readonly kind: BatchKind;
  readonly ts: number;
  readonly statuses: readonly StatusSnapshot[];
};

// ─── Sink Interface ──────────────────────────────────────────────────────────

export interface DiagnosticSink {
  readonly name: string;
  publish(batch: DiagnosticBatch, formatted: string): Promise<void> | void;
}

// ─── Host Collaborators ──────────────────────────────────────────────────────

export type Clock = {
  /** Milliseconds, same unit as Date.now(). */
  now: () => number;
};

/**
 * Periodic callback source. `start` returns the function that cancels it.
 */
export type Timer = {
  start: (callback: () => void, intervalMs: number) => () => void;
};

export type HealthbeatLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

// ─── Config ─────────────────────────────────────────────────────────────────

export type UpdaterConfig = {
  period?: number; // seconds, default 1
  hardwareId?: string; // default ""
  nodeName?: string; // prefixes published names
  verbose?: boolean; // warn-log non-OK statuses
  isolateTaskFailures?: boolean; // default true
  tickIntervalMs?: number; // built-in timer, default 100
};

/** Accepted by setPeriod: plain seconds, or an explicit duration. */
export type PeriodInput = number | { milliseconds: number };

// ─── Init Options (for Updater) ─────────────────────────────────────────────

export type UpdaterInitOptions = {
  /** Period, hardware id, etc. */
  config?: UpdaterConfig;
  /** Sinks receiving every published batch */
  sinks?: DiagnosticSink[];
  /** Time source (defaults to Date.now) */
  clock?: Clock;
  /** Drives tick() after start() (defaults to setInterval) */
  timer?: Timer;
  /** Logger (defaults to console) */
  logger?: HealthbeatLogger;
  /** Log prefix for messages */
  logPrefix?: string;
};

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULTS = {
  periodSeconds: 1.0,
  hardwareId: "",
  tickIntervalMs: 100,
  logPrefix: "healthbeat",
  unsetMessage: "No message was set",
  placeholderMessage: "Node starting up",
  fieldSeparator: "; ",
  noHardwareIdName: "hardware_id",
  noHardwareIdMessage:
    "No hardware ID was set. For devices that do not have one, set the value to 'none'.",
} as const;
