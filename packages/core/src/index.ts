// @healthbeat/core — diagnostic task registry and rate-limited updater

// Types
export type {
  BatchKind,
  Clock,
  DiagnosticBatch,
  DiagnosticSink,
  HealthbeatLogger,
  PeriodInput,
  StatusField,
  StatusLevel,
  StatusSnapshot,
  Timer,
  UpdaterConfig,
  UpdaterInitOptions,
} from "./types.js";

// Constants
export { DEFAULTS, LEVEL_RANK } from "./types.js";

// Updater
export { Updater, intervalTimer, systemClock } from "./updater.js";

// Reports
export { StatusReport, isOk, maxLevel } from "./status-report.js";

// Tasks
export {
  CompositeTask,
  FunctionTask,
  isDiagnosticTask,
  type DiagnosticTask,
  type TaskFunction,
} from "./task.js";

// Registry
export {
  TaskRegistry,
  runEntry,
  type RegistryEntry,
  type RegistryEvents,
} from "./task-registry.js";

// Sink Dispatcher
export { SinkDispatcher } from "./sink-dispatcher.js";

// Formatter
export { formatBatch, formatStatus, formatStatusLine } from "./formatter.js";

// Config
export { formatHardwareId, parseUpdaterConfig, toPeriodMs } from "./config.js";

// Errors
export { ConfigurationError, errorMessage } from "./errors.js";
