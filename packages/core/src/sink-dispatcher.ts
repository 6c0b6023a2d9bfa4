import { formatBatch } from "./formatter.js";
import { errorMessage } from "./errors.js";
import type { DiagnosticBatch, DiagnosticSink, HealthbeatLogger } from "./types.js";

/**
 * Publishes batches to all registered sinks.
 * Fire-and-forget: individual sink failures don't block others.
 */
export class SinkDispatcher {
  private sinks: DiagnosticSink[] = [];
  private logger: HealthbeatLogger;
  private logPrefix: string;

  constructor(opts: {
    sinks?: DiagnosticSink[];
    logger?: HealthbeatLogger;
    logPrefix?: string;
  }) {
    this.sinks = [...(opts.sinks ?? [])];
    this.logger = opts.logger ?? console;
    this.logPrefix = opts.logPrefix ?? "healthbeat";
  }

  /** Add a sink at runtime. */
  addSink(sink: DiagnosticSink): void {
    this.sinks.push(sink);
  }

  /** Send a batch to every sink. Each sink is handed the batch synchronously. */
  async dispatch(batch: DiagnosticBatch): Promise<void> {
    if (this.sinks.length === 0) return;

    const formatted = formatBatch(batch);

    const results = this.sinks.map(async (sink) => {
      try {
        await sink.publish(batch, formatted);
      } catch (err) {
        this.logger.error(`${this.logPrefix}: sink "${sink.name}" failed: ${errorMessage(err)}`);
      }
    });

    await Promise.allSettled(results);
  }

  /** Whether any sinks are registered. */
  get hasSinks(): boolean {
    return this.sinks.length > 0;
  }

  /** Number of registered sinks. */
  get sinkCount(): number {
    return this.sinks.length;
  }
}
