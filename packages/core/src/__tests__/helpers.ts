import { vi, type Mock } from "vitest";
import type {
  Clock,
  DiagnosticBatch,
  DiagnosticSink,
  HealthbeatLogger,
  StatusSnapshot,
  Timer,
} from "../types.js";

export class ManualClock implements Clock {
  constructor(public t = 1_000) {}

  now = (): number => this.t;

  advance(ms: number): void {
    this.t += ms;
  }
}

export class ManualTimer implements Timer {
  callback: (() => void) | null = null;
  intervalMs = 0;
  starts = 0;
  cancels = 0;

  start = (callback: () => void, intervalMs: number): (() => void) => {
    this.callback = callback;
    this.intervalMs = intervalMs;
    this.starts++;
    return () => {
      this.callback = null;
      this.cancels++;
    };
  };

  fire(): void {
    this.callback?.();
  }
}

export class RecordingSink implements DiagnosticSink {
  readonly name = "recording";
  readonly batches: DiagnosticBatch[] = [];
  readonly formatted: string[] = [];

  publish(batch: DiagnosticBatch, formatted: string): void {
    this.batches.push(batch);
    this.formatted.push(formatted);
  }

  ofKind(kind: DiagnosticBatch["kind"]): DiagnosticBatch[] {
    return this.batches.filter((b) => b.kind === kind);
  }

  last(): DiagnosticBatch | undefined {
    return this.batches[this.batches.length - 1];
  }
}

export type SpyLogger = HealthbeatLogger & { info: Mock; warn: Mock; error: Mock };

export function silentLogger(): SpyLogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function names(statuses: readonly StatusSnapshot[]): string[] {
  return statuses.map((s) => s.name);
}
