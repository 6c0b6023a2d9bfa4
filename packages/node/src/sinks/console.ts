import type { DiagnosticBatch, DiagnosticSink, StatusLevel } from "@healthbeat/core";
import { LEVEL_RANK } from "@healthbeat/core";

const LEVEL_COLORS: Record<StatusLevel, string> = {
  ok: "\x1b[32m",    // green
  warn: "\x1b[33m",  // yellow
  error: "\x1b[31m", // red
  stale: "\x1b[35m", // magenta
};
const RESET = "\x1b[0m";

/**
 * Default sink — writes each batch to stderr, tagged with its worst level.
 * Always available, no configuration needed.
 */
export class ConsoleSink implements DiagnosticSink {
  readonly name = "console";

  publish(batch: DiagnosticBatch, formatted: string): void {
    const level = worstLevel(batch);
    const prefix = `${LEVEL_COLORS[level]}[${level.toUpperCase()}]${RESET}`;
    console.error(`${prefix} ${formatted.replace(/\n/g, "\n  ")}`);
  }
}

function worstLevel(batch: DiagnosticBatch): StatusLevel {
  let worst: StatusLevel = "ok";
  for (const status of batch.statuses) {
    if (LEVEL_RANK[status.level] > LEVEL_RANK[worst]) worst = status.level;
  }
  return worst;
}
