import { EventEmitter } from "eventemitter3";
import type { StatusReport } from "./status-report.js";
import { isDiagnosticTask, type DiagnosticTask, type TaskFunction } from "./task.js";

/** A registered task: the name it publishes under and what to call. */
export type RegistryEntry = {
  readonly name: string;
  readonly callback: TaskFunction;
};

export type RegistryEvents = {
  added: (entry: RegistryEntry) => void;
  removed: (entry: RegistryEntry) => void;
};

/** Runs an entry, forcing the report name to the registered one. */
export function runEntry(entry: RegistryEntry, report: StatusReport): void {
  report.name = entry.name;
  entry.callback(report);
  report.name = entry.name;
}

/**
 * Ordered collection of named tasks.
 *
 * Every mutation is a single synchronous step, so on the event loop add,
 * removeByName and snapshot never interleave. Dispatch runs over the copy
 * returned by snapshot(): a task that adds or removes entries from inside
 * its own run changes the registry for the next pass, never the current one.
 *
 * "added" fires after the entry is in place, so listeners may add again.
 */
export class TaskRegistry {
  readonly events = new EventEmitter<RegistryEvents>();
  private entries: readonly RegistryEntry[] = Object.freeze([]);

  /** Register a callback under a name. Duplicate names coexist. */
  add(name: string, callback: TaskFunction): RegistryEntry;
  /** Register a task under its own name. It must outlive its last run. */
  add(task: DiagnosticTask): RegistryEntry;
  add(nameOrTask: string | DiagnosticTask, callback?: TaskFunction): RegistryEntry {
    let entry: RegistryEntry;
    if (typeof nameOrTask === "string") {
      if (!callback) throw new TypeError(`task "${nameOrTask}" has no callback`);
      entry = { name: nameOrTask, callback };
    } else if (isDiagnosticTask(nameOrTask)) {
      const task = nameOrTask;
      entry = { name: task.name, callback: (report) => task.run(report) };
    } else {
      throw new TypeError("add expects a name and callback, or a DiagnosticTask");
    }
    if (entry.name.length === 0) throw new TypeError("task name must not be empty");

    this.entries = Object.freeze([...this.entries, entry]);
    this.events.emit("added", entry);
    return entry;
  }

  /** Remove the first entry registered under `name`. */
  removeByName(name: string): boolean {
    const idx = this.entries.findIndex((e) => e.name === name);
    if (idx < 0) return false;

    const removed = this.entries[idx];
    this.entries = Object.freeze([...this.entries.slice(0, idx), ...this.entries.slice(idx + 1)]);
    if (removed) this.events.emit("removed", removed);
    return true;
  }

  /** Immutable view of the current entries, in registration order. */
  snapshot(): readonly RegistryEntry[] {
    return this.entries;
  }

  names(): string[] {
    return this.entries.map((e) => e.name);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Drop every entry, emitting "removed" for each. Listeners stay. */
  clear(): void {
    const removed = this.entries;
    this.entries = Object.freeze([]);
    for (const entry of removed) this.events.emit("removed", entry);
  }
}
