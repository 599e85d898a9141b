/**
 * Markdown rendering of classified, link-annotated page blocks.
 */

import type {
  BlockClassification,
  ClassificationResult,
  PageBlock,
  SemanticType,
  TextBlock,
  TextSpan,
} from "../types";
import { normalizeListItem } from "./list-patterns";

// Separator between rendered pages. Consumers split on it, keep it exact.
export const PAGE_SEPARATOR = "\n\n---\n\n";

const HEADING_PREFIXES: Partial<Record<SemanticType, string>> = {
  title: "# ",
  heading1: "# ",
  heading2: "## ",
  heading3: "### ",
  heading4: "#### ",
};

/**
 * Thrown when a caller hands the renderer a classification entry whose
 * block index can never be valid (negative or not an integer).
 */
export class InvalidBlockIndexError extends Error {
  constructor(readonly blockIndex: number) {
    super(`Invalid block index: ${blockIndex}`);
    this.name = "InvalidBlockIndexError";
  }
}

// ============================================================================
// LINK-AWARE TEXT EXTRACTION
// ============================================================================

function renderLinkedRun(spans: TextSpan[], url: string): string {
  const raw = spans.map((span) => span.text).join("");
  const text = raw.trim();
  // Whitespace-only runs stay as they are
  if (!text) return raw;
  return `[${text}](${url})`;
}

function extractLineText(spans: TextSpan[]): string {
  let result = "";
  let i = 0;

  while (i < spans.length) {
    const url = spans[i].link?.url;
    if (!url) {
      result += spans[i].text;
      i++;
      continue;
    }

    // Merge every following span that points at the same target
    const run: TextSpan[] = [];
    while (i < spans.length && spans[i].link?.url === url) {
      run.push(spans[i]);
      i++;
    }
    result += renderLinkedRun(run, url);
  }

  return result;
}

/**
 * Block text with links written as markdown. Consecutive spans sharing a
 * URL become one link, since PDF producers often split a single hyperlink
 * into several spans.
 */
export function extractBlockTextWithLinks(block: TextBlock): string {
  return block.lines.map((line) => extractLineText(line.spans)).join("");
}

// ============================================================================
// BLOCK FORMATTING
// ============================================================================

/**
 * Markdown line for a block of the given type, or "" when nothing should
 * be emitted.
 */
export function formatBlockMarkdown(
  semanticType: SemanticType,
  text: string
): string {
  const trimmed = text.trim();
  if (!trimmed) return "";

  if (semanticType === "list_item") {
    return normalizeListItem(trimmed);
  }

  const prefix = HEADING_PREFIXES[semanticType] ?? "";
  return `${prefix}${trimmed}`;
}

function buildClassificationLookup(
  classification: ClassificationResult,
  blockCount: number
): Map<number, BlockClassification> {
  const lookup = new Map<number, BlockClassification>();

  for (const entry of classification.blocks) {
    const { blockIndex } = entry;
    if (!Number.isInteger(blockIndex) || blockIndex < 0) {
      throw new InvalidBlockIndexError(blockIndex);
    }
    // Entries past the last block are ignored, first entry per index wins
    if (blockIndex >= blockCount || lookup.has(blockIndex)) continue;
    lookup.set(blockIndex, entry);
  }

  return lookup;
}

// ============================================================================
// PAGE RENDERING
// ============================================================================

/**
 * Render one page. Each emitted block is followed by a blank line; image
 * blocks consume `imageRefs` in order and emit nothing once they run out.
 */
export function renderPageMarkdown(
  blocks: PageBlock[],
  classification: ClassificationResult,
  imageRefs: string[]
): string {
  const lookup = buildClassificationLookup(classification, blocks.length);
  const lines: string[] = [];
  let imageIndex = 0;

  blocks.forEach((block, blockIndex) => {
    if (block.kind === "image") {
      if (imageIndex < imageRefs.length) {
        lines.push(`![Image](${imageRefs[imageIndex]})`, "");
        imageIndex++;
      }
      return;
    }

    const semanticType = lookup.get(blockIndex)?.semanticType ?? "paragraph";
    const markdown = formatBlockMarkdown(
      semanticType,
      extractBlockTextWithLinks(block)
    );
    if (!markdown) return;

    lines.push(markdown, "");
  });

  return lines.join("\n");
}

/** Join rendered pages, in page order */
export function joinPages(pages: string[]): string {
  return pages.join(PAGE_SEPARATOR);
}
