import { StatusReport } from "./status-report.js";

export type TaskFunction = (report: StatusReport) => void;

/**
 * A named check that fills in a StatusReport. Errors thrown by `run`
 * propagate to whoever called it.
 */
export interface DiagnosticTask {
  readonly name: string;
  run(report: StatusReport): void;
}

export function isDiagnosticTask(value: unknown): value is DiagnosticTask {
  if (typeof value !== "object" || value === null) return false;
  return "name" in value && typeof value.name === "string" && "run" in value && typeof value.run === "function";
}

/** Task backed by a plain callback (or a bound method). */
export class FunctionTask implements DiagnosticTask {
  constructor(
    public readonly name: string,
    private readonly fn: TaskFunction,
  ) {}

  run(report: StatusReport): void {
    this.fn(report);
  }
}

/**
 * Runs child tasks against one report and presents a single merged status:
 * the worst child level, and the non-OK child messages joined in order.
 *
 * Every child sees the summary that was passed in, never a sibling's, but
 * fields accumulate across children. Children are held by reference, so
 * they must stay usable for as long as the composite runs.
 */
export class CompositeTask implements DiagnosticTask {
  private readonly children: DiagnosticTask[] = [];

  constructor(public readonly name: string) {}

  addTask(task: DiagnosticTask): void {
    if (!isDiagnosticTask(task)) {
      throw new TypeError(`${this.name}: addTask expects a DiagnosticTask`);
    }
    this.children.push(task);
  }

  get size(): number {
    return this.children.length;
  }

  run(report: StatusReport): void {
    const original = { level: report.level, message: report.message };
    const combined = new StatusReport();

    for (const child of this.children) {
      report.summaryFrom(original);
      child.run(report);
      combined.mergeSummaryFrom(report);
    }

    report.summaryFrom(combined);
  }
}
