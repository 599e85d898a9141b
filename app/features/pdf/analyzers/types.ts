import type { PageBlock } from "../types";

/**
 * Anything that can be asked, once, to classify a page's blocks.
 *
 * Implementations return the raw response (a parsed JSON mapping), or
 * `null` when they have nothing to offer. Validation happens in the
 * structure analyzer, never here.
 */
export interface ExternalAnalyzer {
  readonly mode: "callback" | "exchange";
  requestAnalysis(
    prompt: string,
    blocks: PageBlock[],
    signal: AbortSignal
  ): Promise<unknown>;
  // Release whatever the analyzer holds open (e.g. a console reader)
  close?(): void;
}

/** Programmatic analyzer registered by the caller */
export type AnalysisCallback = (
  prompt: string,
  blocks: PageBlock[]
) => unknown | Promise<unknown>;

/**
 * Text channel to an interactive analyzer: receives the prompt, resolves
 * with one textual reply (possibly fenced in a code block) or `null`.
 * Must reject or resolve promptly once `signal` aborts.
 */
export interface ExchangeChannel {
  exchange(prompt: string, signal: AbortSignal): Promise<string | null>;
  close?(): void;
}
