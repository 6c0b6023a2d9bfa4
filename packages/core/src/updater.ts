import { formatHardwareId, toPeriodMs } from "./config.js";
import { errorMessage } from "./errors.js";
import { SinkDispatcher } from "./sink-dispatcher.js";
import { StatusReport, isOk } from "./status-report.js";
import type { DiagnosticTask, TaskFunction } from "./task.js";
import { TaskRegistry, runEntry, type RegistryEntry } from "./task-registry.js";
import {
  DEFAULTS,
  type BatchKind,
  type Clock,
  type DiagnosticSink,
  type HealthbeatLogger,
  type PeriodInput,
  type StatusLevel,
  type StatusSnapshot,
  type Timer,
  type UpdaterInitOptions,
} from "./types.js";

export const systemClock: Clock = { now: () => Date.now() };

export const intervalTimer: Timer = {
  start(callback, intervalMs) {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  },
};

/**
 * Updater — runs every registered task at most once per period and
 * publishes the collected reports as one batch.
 *
 * The host calls `tick()` as often as it likes (or calls `start()` to use
 * the built-in timer); a pass only runs once the clock reaches the next
 * due time. Registering a task publishes a placeholder for it at once.
 */
export class Updater {
  readonly tasks: TaskRegistry;

  private dispatcher: SinkDispatcher;
  private clock: Clock;
  private timer: Timer;
  private logger: HealthbeatLogger;
  private logPrefix: string;

  private periodMs: number;
  private nextDue: number;
  private hardwareId: string;
  private nodeName: string | undefined;
  private verbose: boolean;
  private isolateTaskFailures: boolean;
  private tickIntervalMs: number;
  private warnNoHardwareIdDone = false;

  private cancelTimer: (() => void) | null = null;

  constructor(options: UpdaterInitOptions = {}) {
    const config = options.config ?? {};
    this.clock = options.clock ?? systemClock;
    this.timer = options.timer ?? intervalTimer;
    this.logger = options.logger ?? console;
    this.logPrefix = options.logPrefix ?? DEFAULTS.logPrefix;

    this.periodMs = toPeriodMs(config.period ?? DEFAULTS.periodSeconds);
    this.hardwareId = config.hardwareId ?? DEFAULTS.hardwareId;
    this.nodeName = config.nodeName;
    this.verbose = config.verbose ?? false;
    this.isolateTaskFailures = config.isolateTaskFailures ?? true;
    this.tickIntervalMs = config.tickIntervalMs ?? DEFAULTS.tickIntervalMs;
    this.nextDue = this.clock.now() + this.periodMs;

    this.dispatcher = new SinkDispatcher({
      sinks: options.sinks,
      logger: this.logger,
      logPrefix: this.logPrefix,
    });

    // Wire up: registry additions → placeholder publication
    this.tasks = new TaskRegistry();
    this.tasks.events.on("added", (entry) => this.publishPlaceholder(entry));
  }

  // ─── Registration ──────────────────────────────────────────────────────────

  add(name: string, callback: TaskFunction): void;
  add(task: DiagnosticTask): void;
  add(nameOrTask: string | DiagnosticTask, callback?: TaskFunction): void {
    if (typeof nameOrTask === "string") {
      this.tasks.add(nameOrTask, callback ?? missingCallback(nameOrTask));
    } else {
      this.tasks.add(nameOrTask);
    }
  }

  removeByName(name: string): boolean {
    return this.tasks.removeByName(name);
  }

  /** Add a sink at runtime. */
  addSink(sink: DiagnosticSink): void {
    this.dispatcher.addSink(sink);
  }

  // ─── Scheduling ────────────────────────────────────────────────────────────

  /**
   * Run a pass if the period has elapsed. Returns whether one ran. The
   * next due time moves on even when the pass throws.
   */
  tick(): boolean {
    const now = this.clock.now();
    if (now < this.nextDue) return false;
    // A failed pass still uses up its period.
    this.nextDue = now + this.periodMs;
    this.update();
    return true;
  }

  /** Run a pass now. The schedule is left alone. */
  forceUpdate(): void {
    this.update();
  }

  /**
   * Publish `level`/`message` under every registered task name without
   * running any task. Useful around shutdown or self-tests.
   */
  broadcast(level: StatusLevel, message: string): void {
    const statuses = this.tasks.snapshot().map((entry) => {
      const report = this.freshReport(entry.name);
      report.summary(level, message);
      return report.snapshot();
    });
    this.publish("broadcast", statuses);
  }

  /** Period in seconds. */
  getPeriod(): number {
    return this.periodMs / 1000;
  }

  /** Change the period; the next pass is due one new period from now. */
  setPeriod(period: PeriodInput): void {
    this.periodMs = toPeriodMs(period);
    this.nextDue = this.clock.now() + this.periodMs;
  }

  /** When the next pass is due, in clock milliseconds. */
  getNextDue(): number {
    return this.nextDue;
  }

  setHardwareID(hardwareId: string): void {
    this.hardwareId = hardwareId;
  }

  /** printf-style setHardwareID, e.g. `setHardwareIDf("imu-%d", 3)`. */
  setHardwareIDf(fmt: string, ...args: unknown[]): void {
    this.hardwareId = formatHardwareId(fmt, args);
  }

  getHardwareID(): string {
    return this.hardwareId;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /** Start ticking on the timer. */
  start(): void {
    if (this.cancelTimer) return;

    this.cancelTimer = this.timer.start(() => {
      try {
        this.tick();
      } catch (err) {
        this.logger.error(`${this.logPrefix}: diagnostic pass failed: ${errorMessage(err)}`);
      }
    }, this.tickIntervalMs);

    const sinks = this.dispatcher.hasSinks
      ? `${this.dispatcher.sinkCount} sink(s)`
      : "no sinks";
    this.logger.info(`${this.logPrefix}: started, period ${this.getPeriod()}s, ${sinks}`);
  }

  /** Stop the timer. Registered tasks stay. */
  stop(): void {
    if (!this.cancelTimer) return;
    this.cancelTimer();
    this.cancelTimer = null;
    this.logger.info(`${this.logPrefix}: stopped`);
  }

  /** Whether the timer is running. */
  get isRunning(): boolean {
    return this.cancelTimer !== null;
  }

  // ─── Internal ──────────────────────────────────────────────────────────────

  private update(): void {
    const statuses: StatusSnapshot[] = [];

    for (const entry of this.tasks.snapshot()) {
      const status = this.runTask(entry);
      if (this.verbose && !isOk(status.level)) {
        this.logger.warn(
          `${this.logPrefix}: Non-zero diagnostic status. Name: '${status.name}', status ${status.level}: '${status.message}'`,
        );
      }
      statuses.push(status);
    }

    if (this.hardwareId === "" && !this.warnNoHardwareIdDone) {
      this.warnNoHardwareIdDone = true;
      const report = this.freshReport(DEFAULTS.noHardwareIdName);
      report.summary("warn", DEFAULTS.noHardwareIdMessage);
      statuses.push(report.snapshot());
      this.logger.warn(`${this.logPrefix}: ${DEFAULTS.noHardwareIdMessage}`);
    }

    this.publish("update", statuses);
  }

  private runTask(entry: RegistryEntry): StatusSnapshot {
    const report = this.freshReport(entry.name);
    report.summary("error", DEFAULTS.unsetMessage);

    if (!this.isolateTaskFailures) {
      runEntry(entry, report);
      return report.snapshot();
    }

    try {
      runEntry(entry, report);
    } catch (err) {
      report.name = entry.name;
      report.summary("error", `Task failed: ${errorMessage(err)}`);
      this.logger.error(`${this.logPrefix}: task "${entry.name}" failed: ${errorMessage(err)}`);
    }
    return report.snapshot();
  }

  private publishPlaceholder(entry: RegistryEntry): void {
    const report = this.freshReport(entry.name);
    report.summary("ok", DEFAULTS.placeholderMessage);
    this.publish("placeholder", [report.snapshot()]);
  }

  private freshReport(name: string): StatusReport {
    const report = new StatusReport();
    report.name = name;
    report.hardwareId = this.hardwareId;
    return report;
  }

  private publish(kind: BatchKind, statuses: StatusSnapshot[]): void {
    const prefix = this.nodeName ? `${this.nodeName}: ` : "";
    const batch = {
      kind,
      ts: this.clock.now(),
      statuses: statuses.map((s) => ({ ...s, name: prefix + s.name, hardwareId: this.hardwareId })),
    };

    void this.dispatcher.dispatch(batch).catch((err: unknown) => {
      this.logger.error(`${this.logPrefix}: publish failed: ${errorMessage(err)}`);
    });
  }
}

function missingCallback(name: string): never {
  throw new TypeError(`task "${name}" has no callback`);
}
