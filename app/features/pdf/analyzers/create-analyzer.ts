import type { AnalyzerConfig } from "@/app/lib/config";
import { StructureAnalyzer } from "../utils/structure-analyzer";
import { ConsoleExchangeChannel } from "./console-channel";
import { OpenAIExchangeChannel } from "./openai-channel";

export const ANALYZER_CHOICES = ["none", "interactive", "openai"] as const;

export type AnalyzerChoice = (typeof ANALYZER_CHOICES)[number];

export function isAnalyzerChoice(value: unknown): value is AnalyzerChoice {
  return ANALYZER_CHOICES.some((choice) => choice === value);
}

/**
 * Build the structure analyzer for a CLI/analyzer choice.
 * "none" disables external analysis altogether.
 */
export function createStructureAnalyzer(
  choice: AnalyzerChoice,
  config: AnalyzerConfig
): StructureAnalyzer {
  const options = { timeoutMs: config.timeoutMs };

  switch (choice) {
    case "interactive":
      return StructureAnalyzer.fromChannel(new ConsoleExchangeChannel(), options);
    case "openai":
      return StructureAnalyzer.fromChannel(new OpenAIExchangeChannel(config), options);
    case "none":
      return StructureAnalyzer.disabled();
  }
}
