import type { DiagnosticBatch, DiagnosticSink } from "@healthbeat/core";

/**
 * Webhook sink — POSTs every batch as JSON to a URL.
 *
 * ```ts
 * new WebhookSink("https://status.example.com/hooks/diagnostics")
 * ```
 *
 * Payload shape:
 * ```json
 * { "batch": { ...DiagnosticBatch }, "formatted": "..." }
 * ```
 */
export class WebhookSink implements DiagnosticSink {
  readonly name: string;
  private url: string;
  private headers: Record<string, string>;
  private timeoutMs: number;

  constructor(
    url: string,
    opts?: { name?: string; headers?: Record<string, string>; timeoutMs?: number },
  ) {
    this.url = url;
    this.name = opts?.name ?? "webhook";
    this.timeoutMs = opts?.timeoutMs ?? 10_000;
    this.headers = {
      "Content-Type": "application/json",
      ...opts?.headers,
    };
  }

  async publish(batch: DiagnosticBatch, formatted: string): Promise<void> {
    const res = await fetch(this.url, {
      method: "POST",
      headers: this.headers,
      body: JSON.stringify({ batch, formatted }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      throw new Error(`Webhook ${res.status}: ${this.url}`);
    }
  }
}
