import type { PageBlock } from "../types";
import type { AnalysisCallback, ExternalAnalyzer } from "./types";

/**
 * Direct-call adapter around a caller-registered analysis function.
 * The callback's mapping is returned untouched for validation upstream.
 */
export class CallbackAnalyzer implements ExternalAnalyzer {
  readonly mode = "callback" as const;

  constructor(private readonly callback: AnalysisCallback) {}

  async requestAnalysis(
    prompt: string,
    blocks: PageBlock[],
    signal: AbortSignal
  ): Promise<unknown> {
    signal.throwIfAborted();
    return await this.callback(prompt, blocks);
  }
}
