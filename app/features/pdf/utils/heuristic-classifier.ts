/**
 * Font- and position-based block classification.
 * Used on its own and as the fallback of every external analysis path.
 */

import type {
  BlockClassification,
  ClassificationResult,
  PageBlock,
  SemanticType,
} from "../types";
import { calculateMeanLeftMargin, getBlockSignals, type BlockSignals } from "./block-signals";
import { hasListMarker } from "./list-patterns";

// ============================================================================
// CONSTANTS
// ============================================================================

export const HEURISTIC_CONFIDENCE = 0.7;

export const FONT_SIZE_THRESHOLDS = {
  HEADING1: 20,
  HEADING1_BOLD: 16,
  HEADING2: 16,
  HEADING2_BOLD: 14,
  HEADING3: 14,
  HEADING3_BOLD: 12,
} as const;

// Indented blocks without a marker only start a list when they are short
const INDENTED_LIST_MAX_LENGTH = 100;
const METADATA_MAX_LENGTH = 50;

export const UNKNOWN_DOCUMENT_TITLE = "Unknown Document";
export const HEURISTIC_FORMATTING_NOTE =
  "Analysis performed without external analyzer assistance";

// ============================================================================
// CLASSIFICATION
// ============================================================================

interface BlockPosition {
  blockIndex: number;
  isIndented: boolean;
  previousType: SemanticType | null;
}

function classifyHeadingLevel(
  signals: BlockSignals,
  blockIndex: number
): SemanticType | null {
  const { avgFontSize: size, isBold } = signals;

  if (
    size >= FONT_SIZE_THRESHOLDS.HEADING1 ||
    (size >= FONT_SIZE_THRESHOLDS.HEADING1_BOLD && isBold)
  ) {
    return blockIndex === 0 ? "title" : "heading1";
  }
  if (
    size >= FONT_SIZE_THRESHOLDS.HEADING2 ||
    (size >= FONT_SIZE_THRESHOLDS.HEADING2_BOLD && isBold)
  ) {
    return "heading2";
  }
  if (
    size >= FONT_SIZE_THRESHOLDS.HEADING3 ||
    (size >= FONT_SIZE_THRESHOLDS.HEADING3_BOLD && isBold)
  ) {
    return "heading3";
  }
  return null;
}

/**
 * Decide the type of a single text block.
 *
 * List continuation: an indented block right after a list item is taken as
 * the next item even without a marker. This also catches indented quotes or
 * code that follow a list.
 */
export function classifyBlock(
  signals: BlockSignals,
  position: BlockPosition
): SemanticType {
  const heading = classifyHeadingLevel(signals, position.blockIndex);
  if (heading) return heading;

  const trimmed = signals.text.trim();
  const hasMarker = hasListMarker(signals.text);

  if (hasMarker || position.isIndented) {
    if (position.previousType === "list_item") return "list_item";
    if (hasMarker) return "list_item";
    if (trimmed.length < INDENTED_LIST_MAX_LENGTH) return "list_item";
    return "paragraph";
  }

  if (trimmed.length < METADATA_MAX_LENGTH && trimmed.includes(":")) {
    return "metadata";
  }

  return "paragraph";
}

/**
 * Classify every text block of a page. Never throws.
 */
export function classifyBlocks(blocks: PageBlock[]): ClassificationResult {
  const meanLeftMargin = calculateMeanLeftMargin(blocks);
  const classified: BlockClassification[] = [];
  const sections: string[] = [];
  let title: string | null = null;
  let previousType: SemanticType | null = null;

  for (const [blockIndex, block] of blocks.entries()) {
    if (block.kind !== "text") continue;

    const signals = getBlockSignals(block);
    const semanticType = classifyBlock(signals, {
      blockIndex,
      isIndented: signals.leftX0 > meanLeftMargin,
      previousType,
    });

    if (semanticType === "heading1") {
      sections.push(signals.text.trim());
    } else if (semanticType === "title" && title === null) {
      title = signals.text.trim();
    }

    classified.push({
      blockIndex,
      semanticType,
      confidence: HEURISTIC_CONFIDENCE,
      reasoning: `Heuristic: font_size=${signals.avgFontSize.toFixed(1)}, bold=${signals.isBold}, position=[${block.bbox.x0.toFixed(1)}, ${block.bbox.y0.toFixed(1)}]`,
    });
    previousType = semanticType;
  }

  return {
    blocks: classified,
    hierarchy: {
      title: title ?? UNKNOWN_DOCUMENT_TITLE,
      sections,
      hasTableOfContents: false,
      documentType: "unknown",
    },
    formattingNotes: [HEURISTIC_FORMATTING_NOTE],
    source: "heuristic",
  };
}
