import { format } from "node:util";
import {
  DEFAULTS,
  LEVEL_RANK,
  type StatusField,
  type StatusLevel,
  type StatusSnapshot,
} from "./types.js";

/** The more severe of two levels. */
export function maxLevel(a: StatusLevel, b: StatusLevel): StatusLevel {
  return LEVEL_RANK[b] > LEVEL_RANK[a] ? b : a;
}

export function isOk(level: StatusLevel): boolean {
  return level === "ok";
}

/**
 * Mutable report a task fills in. Fields are append-only and may repeat keys.
 */
export class StatusReport {
  name = "";
  level: StatusLevel = "ok";
  message = "";
  hardwareId = "";
  readonly fields: StatusField[] = [];

  /** Set level and message together. */
  summary(level: StatusLevel, message: string): void {
    this.level = level;
    this.message = message;
  }

  /** printf-style summary (Node's util.format directives). */
  summaryf(level: StatusLevel, fmt: string, ...args: unknown[]): void {
    this.summary(level, format(fmt, ...args));
  }

  /** Copy level and message from another report; fields are untouched. */
  summaryFrom(other: Pick<StatusReport, "level" | "message">): void {
    this.summary(other.level, other.message);
  }

  clearSummary(): void {
    this.summary("ok", "");
  }

  /**
   * Fold another summary into this one. Non-OK messages accumulate,
   * joined by "; "; the level only ever rises.
   */
  mergeSummary(level: StatusLevel, message: string): void {
    if (!isOk(level) && !isOk(this.level)) {
      if (this.message.length > 0) this.message += DEFAULTS.fieldSeparator;
      this.message += message;
    } else if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) {
      this.message = message;
    }
    this.level = maxLevel(this.level, level);
  }

  mergeSummaryf(level: StatusLevel, fmt: string, ...args: unknown[]): void {
    this.mergeSummary(level, format(fmt, ...args));
  }

  mergeSummaryFrom(other: Pick<StatusReport, "level" | "message">): void {
    this.mergeSummary(other.level, other.message);
  }

  add(key: string, value: string | number | boolean): void {
    const text = typeof value === "boolean" ? (value ? "True" : "False") : String(value);
    this.fields.push({ key, value: text });
  }

  /** printf-style field value (Node's util.format directives). */
  addf(key: string, fmt: string, ...args: unknown[]): void {
    this.fields.push({ key, value: format(fmt, ...args) });
  }

  /** Reset to a blank OK report, dropping every field. */
  clear(): void {
    this.clearSummary();
    this.fields.length = 0;
  }

  snapshot(): StatusSnapshot {
    return {
      name: this.name,
      level: this.level,
      message: this.message,
      hardwareId: this.hardwareId,
      fields: this.fields.map((f) => ({ key: f.key, value: f.value })),
    };
  }
}
