import * as readline from "node:readline";

import type { ExchangeChannel } from "./types";

const RULE = "=".repeat(80);

/**
 * Interactive channel: prints the analysis prompt and reads one pasted
 * reply. The reply ends at the first blank line (or end of input); an
 * empty first line means "skip". Aborting `signal` cancels the wait.
 *
 * One reader is kept for the channel's lifetime, so lines that arrive
 * ahead of time (piped input, several replies pasted at once) are queued
 * for the following exchanges. Call `close()` once conversion is done.
 */
export class ConsoleExchangeChannel implements ExchangeChannel {
  private reader: readline.Interface | null = null;
  private readonly queued: string[] = [];
  private ended = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async exchange(prompt: string, signal: AbortSignal): Promise<string | null> {
    signal.throwIfAborted();

    this.output.write(
      [
        "",
        RULE,
        "STRUCTURE ANALYSIS REQUEST",
        RULE,
        prompt,
        RULE,
        "Paste the JSON response, then an empty line (or just press Enter to use heuristic analysis):",
        "",
      ].join("\n")
    );

    const lines: string[] = [];
    for (;;) {
      const line = await this.nextLine(signal);
      if (line === null || line.trim() === "") break;
      lines.push(line);
    }

    return lines.length > 0 ? lines.join("\n") : null;
  }

  /** Stop reading input. Later exchanges get only what is already queued. */
  close(): void {
    this.ended = true;
    this.reader?.close();
    this.notify();
  }

  private startReader(): void {
    if (this.reader || this.ended) return;

    const reader = readline.createInterface({ input: this.input, terminal: false });
    reader.on("line", (line) => {
      this.queued.push(line);
      this.notify();
    });
    reader.on("close", () => {
      this.ended = true;
      this.notify();
    });
    this.reader = reader;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async nextLine(signal: AbortSignal): Promise<string | null> {
    this.startReader();

    for (;;) {
      signal.throwIfAborted();

      const line = this.queued.shift();
      if (line !== undefined) return line;
      if (this.ended) return null;

      await new Promise<void>((resolve) => {
        const onAbort = () => {
          this.wake = null;
          resolve();
        };
        signal.addEventListener("abort", onAbort, { once: true });
        this.wake = () => {
          signal.removeEventListener("abort", onAbort);
          resolve();
        };
      });
    }
  }
}
