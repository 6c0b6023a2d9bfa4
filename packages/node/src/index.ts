import {
  Updater,
  parseUpdaterConfig,
  type DiagnosticSink,
  type DiagnosticTask,
  type HealthbeatLogger,
  type TaskFunction,
  type UpdaterConfig,
} from "@healthbeat/core";
import { ConsoleSink } from "./sinks/console.js";

export type { DiagnosticSink, DiagnosticTask, HealthbeatLogger, TaskFunction, UpdaterConfig };
export { CompositeTask, FunctionTask, StatusReport, Updater } from "@healthbeat/core";

// Re-export built-in sinks
export { ConsoleSink } from "./sinks/console.js";
export { WebhookSink } from "./sinks/webhook.js";

// ─── Global singleton ────────────────────────────────────────────────────────

let _updater: Updater | null = null;

export type HealthbeatNodeOptions = {
  /** Sinks to publish batches to. Defaults to [ConsoleSink]. */
  sinks?: DiagnosticSink[];
  /** Updater config, typed or straight from a host config file. */
  config?: UpdaterConfig | Record<string, unknown>;
  /** Logger. Defaults to console. */
  logger?: HealthbeatLogger;
};

/**
 * Initialize the process-wide updater and start its timer. Call once at
 * app startup; calling again replaces the previous updater.
 *
 * ```ts
 * import { init, addTask } from "@healthbeat/node";
 * init({ config: { period: 2, hardwareId: "imu-0" } });
 * addTask("battery", (report) => report.summary("ok", "charged"));
 * ```
 */
export function init(options: HealthbeatNodeOptions = {}): Updater {
  if (_updater?.isRunning) {
    _updater.stop();
  }

  _updater = new Updater({
    config: parseUpdaterConfig(options.config),
    sinks: options.sinks ?? [new ConsoleSink()],
    logger: options.logger,
  });

  _updater.start();
  return _updater;
}

/**
 * Register a task with the process-wide updater. Must call init() first.
 */
export function addTask(name: string, callback: TaskFunction): void;
export function addTask(task: DiagnosticTask): void;
export function addTask(nameOrTask: string | DiagnosticTask, callback?: TaskFunction): void {
  const updater = requireUpdater("addTask");
  if (typeof nameOrTask === "string") {
    if (!callback) throw new TypeError(`task "${nameOrTask}" has no callback`);
    updater.add(nameOrTask, callback);
  } else {
    updater.add(nameOrTask);
  }
}

export function removeTask(name: string): boolean {
  return requireUpdater("removeTask").removeByName(name);
}

/** Publish all diagnostics now, outside the period. */
export function forceUpdate(): void {
  requireUpdater("forceUpdate").forceUpdate();
}

/**
 * Stop the process-wide updater.
 */
export function shutdown(): void {
  if (_updater) {
    _updater.stop();
    _updater = null;
  }
}

/**
 * Get the current updater instance (for advanced usage).
 */
export function getUpdater(): Updater | null {
  return _updater;
}

function requireUpdater(caller: string): Updater {
  if (!_updater) {
    throw new Error(`[healthbeat] ${caller} called before init()`);
  }
  return _updater;
}
