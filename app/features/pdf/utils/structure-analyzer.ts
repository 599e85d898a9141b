/**
 * Structure analysis orchestration.
 *
 * Tries the external analyzer bound at construction (callback or text
 * exchange) once, validates what comes back, and falls back to the
 * heuristic classifier on any failure. `analyze` never rejects.
 */

import type { ClassificationResult, PageBlock, PageContext } from "../types";
import { buildAnalysisPrompt } from "../analyzers/analysis-prompt";
import { parseAnalysisResponse } from "../analyzers/analysis-schema";
import { CallbackAnalyzer } from "../analyzers/callback-analyzer";
import { ExchangeAnalyzer } from "../analyzers/exchange-analyzer";
import type {
  AnalysisCallback,
  ExchangeChannel,
  ExternalAnalyzer,
} from "../analyzers/types";
import { classifyBlocks } from "./heuristic-classifier";

export const DEFAULT_ANALYSIS_TIMEOUT_MS = 120_000;

export type AnalyzerMode = ExternalAnalyzer["mode"] | "disabled";

export interface StructureAnalyzerOptions {
  // Upper bound on the wait for the external analyzer
  timeoutMs?: number;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class StructureAnalyzer {
  private readonly timeoutMs: number;

  constructor(
    private readonly external: ExternalAnalyzer | null,
    options: StructureAnalyzerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_ANALYSIS_TIMEOUT_MS;
  }

  /** Heuristic analysis only, no external attempt */
  static disabled(): StructureAnalyzer {
    return new StructureAnalyzer(null);
  }

  static fromCallback(
    callback: AnalysisCallback,
    options?: StructureAnalyzerOptions
  ): StructureAnalyzer {
    return new StructureAnalyzer(new CallbackAnalyzer(callback), options);
  }

  static fromChannel(
    channel: ExchangeChannel,
    options?: StructureAnalyzerOptions
  ): StructureAnalyzer {
    return new StructureAnalyzer(new ExchangeAnalyzer(channel), options);
  }

  get mode(): AnalyzerMode {
    return this.external?.mode ?? "disabled";
  }

  /** Release the external analyzer once no more pages will be analyzed */
  close(): void {
    this.external?.close?.();
  }

  async analyze(
    blocks: PageBlock[],
    context: PageContext,
    options: AnalyzeOptions = {}
  ): Promise<ClassificationResult> {
    if (!this.external) {
      return classifyBlocks(blocks);
    }

    const prompt = buildAnalysisPrompt(blocks, context);

    try {
      const raw = await this.requestWithDeadline(
        this.external,
        prompt,
        blocks,
        options.signal
      );
      const result = parseAnalysisResponse(raw, blocks);
      if (result) {
        console.log(
          `[structure-analyzer] Page ${context.pageNumber}: using ${this.external.mode} analysis (${result.blocks.length} blocks)`
        );
        return result;
      }
      console.warn(
        `[structure-analyzer] Page ${context.pageNumber}: no usable "structure" in ${this.external.mode} response, falling back to heuristic analysis`
      );
    } catch (error) {
      console.warn(
        `[structure-analyzer] Page ${context.pageNumber}: ${this.external.mode} analysis failed (${describeError(error)}), falling back to heuristic analysis`
      );
    }

    return classifyBlocks(blocks);
  }

  /**
   * Single attempt, settled by whichever comes first: the analyzer, the
   * timeout, or the caller's signal.
   */
  private async requestWithDeadline(
    external: ExternalAnalyzer,
    prompt: string,
    blocks: PageBlock[],
    callerSignal: AbortSignal | undefined
  ): Promise<unknown> {
    const controller = new AbortController();
    const cancel = () =>
      controller.abort(callerSignal?.reason ?? new Error("Analysis cancelled"));

    if (callerSignal?.aborted) {
      cancel();
    } else {
      callerSignal?.addEventListener("abort", cancel, { once: true });
    }

    const timer = setTimeout(() => {
      controller.abort(
        new Error(`External analysis timed out after ${this.timeoutMs}ms`)
      );
    }, this.timeoutMs);

    const aborted = new Promise<never>((_, reject) => {
      const { signal } = controller;
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener("abort", () => reject(signal.reason), {
        once: true,
      });
    });

    try {
      return await Promise.race([
        external.requestAnalysis(prompt, blocks, controller.signal),
        aborted,
      ]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", cancel);
    }
  }
}
