import type { DiagnosticBatch, StatusSnapshot } from "./types.js";

// ─── Single Status ───────────────────────────────────────────────────────────

export function formatStatusLine(status: StatusSnapshot): string {
  const head = `[${status.level.toUpperCase()}] ${status.name}`;
  return status.message ? `${head}: ${status.message}` : head;
}

export function formatStatus(status: StatusSnapshot): string {
  const lines = [formatStatusLine(status)];
  if (status.hardwareId) lines.push(`  hardware_id: ${status.hardwareId}`);
  for (const field of status.fields) {
    lines.push(`  ${field.key}: ${field.value}`);
  }
  return lines.join("\n");
}

// ─── Batch ──────────────────────────────────────────────────────────────────

/**
 * Plain-text rendering handed to sinks alongside the batch.
 *
 * ```
 * Diagnostics (update, 2 statuses)
 * [OK] battery: charged
 * [WARN] imu: drifting
 *   drift: 0.4
 * ```
 */
export function formatBatch(batch: DiagnosticBatch): string {
  const n = batch.statuses.length;
  const lines = [`Diagnostics (${batch.kind}, ${n} status${n === 1 ? "" : "es"})`];
  for (const status of batch.statuses) {
    lines.push(formatStatus(status));
  }
  return lines.join("\n");
}
