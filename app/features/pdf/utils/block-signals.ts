/**
 * Typographic and positional signals read off a text block.
 * Shared by the heuristic classifier and the analysis prompt.
 */

import { FONT_FLAGS, type PageBlock, type TextBlock, type TextSpan } from "../types";

// Used when a block has no spans at all
export const DEFAULT_FONT_SIZE = 12;

export interface BlockSignals {
  avgFontSize: number;
  isBold: boolean;
  isItalic: boolean;
  leftX0: number;
  text: string;
  fonts: string[];
}

export function isBoldSpan(span: TextSpan): boolean {
  return (span.flags & FONT_FLAGS.BOLD) !== 0;
}

export function isItalicSpan(span: TextSpan): boolean {
  return (span.flags & FONT_FLAGS.ITALIC) !== 0;
}

export function blockSpans(block: TextBlock): TextSpan[] {
  return block.lines.flatMap((line) => line.spans);
}

/**
 * Plain text of a block: span texts concatenated in reading order
 */
export function getBlockText(block: TextBlock): string {
  return blockSpans(block)
    .map((span) => span.text)
    .join("");
}

/**
 * Mean span size. Every span counts once, whatever its length.
 */
export function getAverageFontSize(block: TextBlock): number {
  const spans = blockSpans(block);
  if (spans.length === 0) return DEFAULT_FONT_SIZE;
  const total = spans.reduce((sum, span) => sum + span.size, 0);
  return total / spans.length;
}

/**
 * A block is bold when more than half of its characters are bold
 */
export function isBlockBold(block: TextBlock): boolean {
  let boldChars = 0;
  let totalChars = 0;

  for (const span of blockSpans(block)) {
    totalChars += span.text.length;
    if (isBoldSpan(span)) boldChars += span.text.length;
  }

  return totalChars > 0 && boldChars / totalChars > 0.5;
}

export function getBlockSignals(block: TextBlock): BlockSignals {
  const spans = blockSpans(block);
  return {
    avgFontSize: getAverageFontSize(block),
    isBold: isBlockBold(block),
    // Any italic span marks the block, like the prompt's [ITALIC] tag
    isItalic: spans.some(isItalicSpan),
    leftX0: block.bbox.x0,
    text: getBlockText(block),
    fonts: [...new Set(spans.map((span) => span.font))],
  };
}

/**
 * Mean left edge over all text blocks of a page, 0 when there are none
 */
export function calculateMeanLeftMargin(blocks: PageBlock[]): number {
  const margins = blocks
    .filter((block): block is TextBlock => block.kind === "text")
    .map((block) => block.bbox.x0);

  if (margins.length === 0) return 0;
  return margins.reduce((sum, x0) => sum + x0, 0) / margins.length;
}
