/**
 * Link overlay: matches page link annotations to the text spans they cover.
 * Pure functions, the input blocks are never mutated.
 */

import type {
  BoundingBox,
  PageBlock,
  PageLink,
  SpanLink,
  TextBlock,
  TextSpan,
} from "../types";

// A link must cover strictly more than this share of a span's area
export const LINK_OVERLAP_THRESHOLD = 0.5;

// ============================================================================
// GEOMETRY
// ============================================================================

export function rectArea(rect: BoundingBox): number {
  return (rect.x1 - rect.x0) * (rect.y1 - rect.y0);
}

export function intersectionArea(a: BoundingBox, b: BoundingBox): number {
  const overlapX = Math.max(0, Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0));
  const overlapY = Math.max(0, Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0));
  return overlapX * overlapY;
}

/**
 * Share of `span` covered by `rect`. Degenerate spans (zero or negative
 * area) always yield 0.
 */
export function overlapRatio(span: BoundingBox, rect: BoundingBox): number {
  const spanArea = rectArea(span);
  if (spanArea <= 0) return 0;
  return intersectionArea(span, rect) / spanArea;
}

// ============================================================================
// LINK MATCHING
// ============================================================================

/**
 * First link, in input order, that covers the majority of the span.
 * A link that only grazes the span's edge is ignored.
 */
export function findSpanLink(
  spanBox: BoundingBox,
  links: PageLink[]
): SpanLink | undefined {
  for (const link of links) {
    const ratio = overlapRatio(spanBox, link.rect);
    if (ratio > LINK_OVERLAP_THRESHOLD) {
      return { url: link.url, kind: link.kind, overlapRatio: ratio };
    }
  }
  return undefined;
}

function attachSpanLink(span: TextSpan, links: PageLink[]): TextSpan {
  const link = findSpanLink(span.bbox, links);
  if (!link) {
    // Drop any stale annotation so the result only reflects `links`
    if (span.link === undefined) return span;
    const { link: _stale, ...rest } = span;
    return rest;
  }
  return { ...span, link };
}

function attachBlockLinks(block: TextBlock, links: PageLink[]): TextBlock {
  return {
    ...block,
    lines: block.lines.map((line) => ({
      ...line,
      spans: line.spans.map((span) => attachSpanLink(span, links)),
    })),
  };
}

/**
 * Return a copy of `blocks` where every text span carries the link that
 * covers it, if any. Image blocks are passed through unchanged.
 */
export function attachLinks(
  blocks: PageBlock[],
  links: PageLink[]
): PageBlock[] {
  return blocks.map((block) =>
    block.kind === "text" ? attachBlockLinks(block, links) : block
  );
}
