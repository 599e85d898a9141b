// ============================================================================
// GEOMETRY
// ============================================================================

/** Axis-aligned rectangle in page space: left, top, right, bottom */
export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

// ============================================================================
// FRAGMENT MODEL
// ============================================================================

/**
 * MuPDF font flags: bit 0 = superscript, bit 1 = italic, bit 2 = serif,
 * bit 3 = monospace, bit 4 = bold
 */
export const FONT_FLAGS = {
  SUPERSCRIPT: 1,
  ITALIC: 2,
  SERIF: 4,
  MONOSPACE: 8,
  BOLD: 16,
} as const;

export type LinkKind = "external" | "internal" | "other";

/** Link annotation as read from the page, before it is matched to any text */
export interface PageLink {
  kind: LinkKind;
  url: string;
  rect: BoundingBox;
}

/** Link attached to a span by the link overlay */
export interface SpanLink {
  url: string;
  kind: LinkKind;
  overlapRatio: number;
}

export interface TextSpan {
  readonly text: string;
  readonly font: string;
  readonly size: number; // points
  readonly flags: number;
  readonly color?: number; // sRGB packed as 0xRRGGBB
  readonly bbox: BoundingBox;
  readonly link?: SpanLink;
}

export interface TextLine {
  bbox: BoundingBox;
  spans: TextSpan[];
}

export interface TextBlock {
  kind: "text";
  bbox: BoundingBox;
  lines: TextLine[];
}

/** Image placeholder. The binary stays with the extraction layer. */
export interface ImageBlock {
  kind: "image";
  bbox: BoundingBox;
}

export type PageBlock = TextBlock | ImageBlock;

/** One page as handed over by the extraction layer */
export interface ExtractedPage {
  pageNumber: number; // 1-based
  width: number;
  height: number;
  blocks: PageBlock[];
  links: PageLink[];
  imageRefs: string[];
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export const SEMANTIC_TYPES = [
  "title",
  "heading1",
  "heading2",
  "heading3",
  "heading4",
  "paragraph",
  "list_item",
  "table_cell",
  "caption",
  "metadata",
  "other",
] as const;

export type SemanticType = (typeof SEMANTIC_TYPES)[number];

export interface BlockClassification {
  blockIndex: number; // 0-based index into the page's block sequence
  semanticType: SemanticType;
  confidence: number; // 0-1
  reasoning: string;
}

export interface DocumentHierarchy {
  title: string;
  sections: string[];
  hasTableOfContents: boolean;
  documentType: string;
}

export type ClassificationSource = "heuristic" | "external";

export interface ClassificationResult {
  blocks: BlockClassification[];
  hierarchy: DocumentHierarchy;
  formattingNotes: string[];
  source: ClassificationSource;
}

/** Where a page sits in its document, for the analysis prompt */
export interface PageContext {
  filename: string;
  pageNumber: number;
  totalPages: number;
}
