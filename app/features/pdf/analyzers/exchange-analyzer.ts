import type { PageBlock } from "../types";
import type { ExchangeChannel, ExternalAnalyzer } from "./types";

/**
 * Parse a textual analyzer reply into a JSON value.
 *
 * Tries the whole reply first, then the span between the first "{" and the
 * last "}" so that ```json fences or surrounding prose are tolerated.
 * Throws when neither parses.
 */
export function parseExchangeReply(reply: string): unknown {
  const trimmed = reply.trim();

  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const start = trimmed.indexOf("{");
    const end = trimmed.lastIndexOf("}");
    if (start === -1 || end <= start) {
      throw error;
    }
    return JSON.parse(trimmed.slice(start, end + 1));
  }
}

/**
 * Suspend/resume adapter: hands the prompt to a text channel and waits for
 * a single reply. An empty reply means "no analysis".
 */
export class ExchangeAnalyzer implements ExternalAnalyzer {
  readonly mode = "exchange" as const;

  constructor(private readonly channel: ExchangeChannel) {}

  async requestAnalysis(
    prompt: string,
    _blocks: PageBlock[],
    signal: AbortSignal
  ): Promise<unknown> {
    const reply = await this.channel.exchange(prompt, signal);
    if (reply === null || reply.trim() === "") {
      return null;
    }
    return parseExchangeReply(reply);
  }

  close(): void {
    this.channel.close?.();
  }
}
