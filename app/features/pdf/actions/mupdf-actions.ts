import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type * as MuPDF from "mupdf";

import {
  FONT_FLAGS,
  type BoundingBox,
  type ExtractedPage,
  type PageBlock,
  type PageLink,
  type TextBlock,
  type TextLine,
  type TextSpan,
} from "../types";
import { StructureAnalyzer } from "../utils/structure-analyzer";
import {
  analyzePages,
  convertPagesToMarkdown,
  type PageAnalysis,
} from "./markdown-actions";

type MuPDFModule = typeof MuPDF;

// Anything MuPDF can turn into a PNG (its Image class)
interface PngSource {
  toPixmap(): { asPNG(): Uint8Array };
}

// The parts of a MuPDF Link read during extraction
interface LinkSource {
  getBounds(): readonly number[];
  getURI(): string;
  isExternal(): boolean;
}

export const IMAGES_DIR_NAME = "images";

// ============================================================================
// FONT & GEOMETRY HELPERS
// ============================================================================

/**
 * Style flags for a span. Font name is checked too since the font's own
 * bold/italic flags aren't always reliable.
 */
export function parseFontFlags(
  fontName: string,
  isBold: boolean,
  isItalic: boolean
): number {
  const isBoldName = /[.\-_]B$|Bold|\.B\+|Bd$/i.test(fontName);
  const isItalicName = /[.\-_]I$|Italic|Oblique/i.test(fontName);

  let flags = 0;
  if (isBold || isBoldName) flags |= FONT_FLAGS.BOLD;
  if (isItalic || isItalicName) flags |= FONT_FLAGS.ITALIC;
  return flags;
}

/**
 * Pack a fill color as 0xRRGGBB. Gray, RGB and CMYK components (0..1) are
 * accepted; anything else reads as black.
 */
export function packColor(components: readonly number[]): number {
  const channel = (value: number) =>
    Math.round(Math.min(1, Math.max(0, value)) * 255);

  let rgb: number[];
  if (components.length === 1) {
    rgb = [components[0], components[0], components[0]];
  } else if (components.length === 3) {
    rgb = [...components];
  } else if (components.length === 4) {
    const [c, m, y, k] = components;
    rgb = [(1 - c) * (1 - k), (1 - m) * (1 - k), (1 - y) * (1 - k)];
  } else {
    return 0;
  }

  const [r, g, b] = rgb.map(channel);
  return (r << 16) | (g << 8) | b;
}

function rectToBox(rect: readonly number[]): BoundingBox {
  return {
    x0: rect[0] ?? 0,
    y0: rect[1] ?? 0,
    x1: rect[2] ?? 0,
    y1: rect[3] ?? 0,
  };
}

/**
 * Bounding box of a character quad: [ulx, uly, urx, ury, llx, lly, lrx, lry]
 */
function quadToBox(quad: readonly number[]): BoundingBox {
  const xs = [quad[0], quad[2], quad[4], quad[6]];
  const ys = [quad[1], quad[3], quad[5], quad[7]];
  return {
    x0: Math.min(...xs),
    y0: Math.min(...ys),
    x1: Math.max(...xs),
    y1: Math.max(...ys),
  };
}

function unionBox(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

// ============================================================================
// STRUCTURED TEXT COLLECTION
// ============================================================================

interface SpanDraft {
  text: string;
  font: string;
  size: number;
  flags: number;
  color: number;
  bbox: BoundingBox;
}

interface LineDraft {
  bbox: BoundingBox;
  spans: SpanDraft[];
}

/**
 * Builds page blocks from the structured-text walker callbacks.
 * Characters sharing font, size, style flags and color are grouped into spans.
 */
export class PageBlockCollector {
  readonly blocks: PageBlock[] = [];
  readonly images: PngSource[] = [];

  private blockBox: BoundingBox | null = null;
  private lines: LineDraft[] = [];
  private line: LineDraft | null = null;
  private span: SpanDraft | null = null;

  beginTextBlock(bbox: readonly number[]): void {
    this.blockBox = rectToBox(bbox);
    this.lines = [];
  }

  beginLine(bbox: readonly number[]): void {
    this.line = { bbox: rectToBox(bbox), spans: [] };
    this.span = null;
  }

  addChar(
    c: string,
    font: string,
    size: number,
    flags: number,
    color: number,
    quad: readonly number[]
  ): void {
    if (!this.line) return;
    const charBox = quadToBox(quad);
    const span = this.span;

    if (
      span &&
      span.font === font &&
      span.size === size &&
      span.flags === flags &&
      span.color === color
    ) {
      span.text += c;
      span.bbox = unionBox(span.bbox, charBox);
      return;
    }

    this.span = { text: c, font, size, flags, color, bbox: charBox };
    this.line.spans.push(this.span);
  }

  endLine(): void {
    if (this.line && this.line.spans.length > 0) {
      this.lines.push(this.line);
    }
    this.line = null;
    this.span = null;
  }

  endTextBlock(): void {
    if (this.blockBox && this.lines.length > 0) {
      this.blocks.push(buildTextBlock(this.blockBox, this.lines));
    }
    this.blockBox = null;
    this.lines = [];
  }

  addImage(bbox: readonly number[], image: PngSource): void {
    this.blocks.push({ kind: "image", bbox: rectToBox(bbox) });
    this.images.push(image);
  }
}

/**
 * Freeze drafted lines into a text block. A line followed by another line
 * gets a trailing space unless it already ends in whitespace or a hyphen,
 * so words don't run together when the lines are concatenated.
 */
function buildTextBlock(bbox: BoundingBox, drafts: LineDraft[]): TextBlock {
  const lines: TextLine[] = drafts.map((draft, index) => {
    const spans: TextSpan[] = draft.spans.map((span) => ({ ...span }));
    const last = spans[spans.length - 1];
    const hasNextLine = index < drafts.length - 1;

    if (hasNextLine && last && !/[\s-]$/.test(last.text)) {
      spans[spans.length - 1] = { ...last, text: `${last.text} ` };
    }
    return { bbox: draft.bbox, spans };
  });

  return { kind: "text", bbox, lines };
}

// ============================================================================
// PAGE EXTRACTION
// ============================================================================

export function extractPageContent(page: MuPDF.Page): PageBlockCollector {
  const collector = new PageBlockCollector();
  const sText = page.toStructuredText("preserve-whitespace,preserve-images");

  sText.walk({
    beginTextBlock: (bbox) => collector.beginTextBlock(bbox),
    beginLine: (bbox) => collector.beginLine(bbox),
    onChar: (c, _origin, font, size, quad, color) =>
      collector.addChar(
        c,
        font.getName(),
        size,
        parseFontFlags(font.getName(), font.isBold(), font.isItalic()),
        packColor(color),
        quad
      ),
    endLine: () => collector.endLine(),
    endTextBlock: () => collector.endTextBlock(),
    onImageBlock: (bbox, _transform, image) => collector.addImage(bbox, image),
  });

  return collector;
}

/**
 * Page link annotations. Internal links point at `#page-N` when the target
 * resolves, `#internal-ref` otherwise.
 */
export function extractPageLinks<L extends LinkSource>(
  links: L[],
  resolveLink: (link: L) => number
): PageLink[] {
  return links.map((link): PageLink => {
    const rect = rectToBox(link.getBounds());
    const uri = link.getURI();

    if (link.isExternal()) {
      return { kind: "external", url: uri, rect };
    }
    if (!uri) {
      return { kind: "other", url: "", rect };
    }

    try {
      const target = resolveLink(link);
      if (target >= 0) {
        return { kind: "internal", url: `#page-${target + 1}`, rect };
      }
    } catch (err) {
      console.warn(`[MuPDF] Could not resolve internal link "${uri}":`, err);
    }
    return { kind: "internal", url: "#internal-ref", rect };
  });
}

/**
 * Write a page's images as PNG files and return their refs relative to the
 * markdown file. Images that fail to encode are skipped.
 */
export async function saveImages(
  images: PngSource[],
  pageNumber: number,
  imagesDir: string
): Promise<string[]> {
  const refs: string[] = [];
  if (images.length === 0) return refs;

  await mkdir(imagesDir, { recursive: true });

  for (const [index, image] of images.entries()) {
    try {
      const png = image.toPixmap().asPNG();
      const hash = createHash("md5").update(png).digest("hex").slice(0, 8);
      const filename = `image_${pageNumber}_${index}_${hash}.png`;

      await writeFile(path.join(imagesDir, filename), png);
      refs.push(`${IMAGES_DIR_NAME}/${filename}`);
    } catch (err) {
      console.warn(
        `[MuPDF] Failed to extract image ${index} from page ${pageNumber}:`,
        err
      );
    }
  }

  return refs;
}

function readMetadata(
  mupdf: MuPDFModule,
  doc: MuPDF.Document
): Record<string, string> {
  const keys = {
    title: mupdf.Document.META_INFO_TITLE,
    author: mupdf.Document.META_INFO_AUTHOR,
    subject: mupdf.Document.META_INFO_SUBJECT,
    keywords: mupdf.Document.META_INFO_KEYWORDS,
    creator: mupdf.Document.META_INFO_CREATOR,
    producer: mupdf.Document.META_INFO_PRODUCER,
  };

  const metadata: Record<string, string> = {};
  for (const [name, key] of Object.entries(keys)) {
    metadata[name] = doc.getMetaData(key) || "";
  }
  return metadata;
}

export interface ExtractionOptions {
  // Directory for extracted PNGs, or null to skip image extraction
  imagesDir: string | null;
  onProgress?: (message: string) => void;
}

export interface ExtractedDocument {
  pages: ExtractedPage[];
  metadata: Record<string, string>;
}

/**
 * Open a PDF and extract blocks, links and images for every page
 */
export async function extractDocument(
  data: Uint8Array,
  options: ExtractionOptions
): Promise<ExtractedDocument> {
  const mupdf = await import("mupdf");
  const doc = mupdf.Document.openDocument(data, "application/pdf");
  const numPages = doc.countPages();
  const pages: ExtractedPage[] = [];

  for (let pageIndex = 0; pageIndex < numPages; pageIndex++) {
    const pageNumber = pageIndex + 1;
    options.onProgress?.(`Extracting content page ${pageNumber}/${numPages}...`);

    const page = doc.loadPage(pageIndex);
    const [x0, y0, x1, y1] = page.getBounds();
    const content = extractPageContent(page);
    const imageRefs = options.imagesDir
      ? await saveImages(content.images, pageNumber, options.imagesDir)
      : [];

    pages.push({
      pageNumber,
      width: x1 - x0,
      height: y1 - y0,
      blocks: content.blocks,
      links: extractPageLinks(page.getLinks(), (link) => doc.resolveLink(link)),
      imageRefs,
    });
  }

  let metadata: Record<string, string> = {};
  try {
    metadata = readMetadata(mupdf, doc);
  } catch (err) {
    console.warn("[MuPDF] Metadata extraction failed:", err);
  }

  return { pages, metadata };
}

// ============================================================================
// CONVERSION ACTIONS
// ============================================================================

export interface ConversionOptions {
  outputDir?: string;
  outputName?: string;
  extractImages?: boolean; // Default true
  analyzer?: StructureAnalyzer; // Default: heuristic only
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
}

export interface ConversionData {
  markdown: string;
  numPages: number;
  metadata: Record<string, string>;
}

export interface ActionResult<T> {
  data: T | null;
  error: string | null;
  processingTime: number;
}

function imagesDirFor(outputDir: string | undefined, extractImages: boolean): string | null {
  if (!extractImages || !outputDir) return null;
  return path.join(outputDir, IMAGES_DIR_NAME);
}

async function convertData(
  data: Uint8Array,
  filename: string,
  options: ConversionOptions
): Promise<ConversionData> {
  const analyzer = options.analyzer ?? StructureAnalyzer.disabled();
  const { pages, metadata } = await extractDocument(data, {
    imagesDir: imagesDirFor(options.outputDir, options.extractImages ?? true),
    onProgress: options.onProgress,
  });

  console.log(
    `[MuPDF] ${filename}: ${pages.length} pages, ${analyzer.mode} structure analysis`
  );

  const { markdown } = await convertPagesToMarkdown(pages, analyzer, {
    filename,
    signal: options.signal,
    onProgress: options.onProgress,
  });

  return { markdown, numPages: pages.length, metadata };
}

/**
 * Convert base64-encoded PDF data. Images are only extracted when an
 * output directory is given. Never throws.
 */
export async function convertPdfToMarkdownAction(
  base64Data: string,
  filename: string,
  options: ConversionOptions = {}
): Promise<ActionResult<ConversionData>> {
  const startTime = performance.now();

  try {
    const bytes = new Uint8Array(Buffer.from(base64Data, "base64"));
    const data = await convertData(bytes, filename, options);
    return { data, error: null, processingTime: performance.now() - startTime };
  } catch (err) {
    console.error("MuPDF conversion error:", err);
    return {
      data: null,
      error: err instanceof Error ? err.message : "Failed to convert PDF with MuPDF",
      processingTime: performance.now() - startTime,
    };
  }
}

/**
 * Convert a PDF file and write `<outputDir>/<name>.md` (default: next to the
 * PDF, named after it). Returns the markdown file's path.
 */
export async function convertPdfFileToMarkdown(
  pdfPath: string,
  options: ConversionOptions = {}
): Promise<string> {
  const outputDir = options.outputDir ?? path.dirname(pdfPath);
  const outputName =
    options.outputName ?? `${path.basename(pdfPath, path.extname(pdfPath))}.md`;

  const bytes = await readFile(pdfPath);
  await mkdir(outputDir, { recursive: true });

  const { markdown } = await convertData(bytes, path.basename(pdfPath), {
    ...options,
    outputDir,
  });

  const outputPath = path.join(outputDir, outputName);
  await writeFile(outputPath, markdown, "utf-8");
  return outputPath;
}

/**
 * Structure analysis without rendering. Never throws.
 */
export async function analyzePdfStructureAction(
  pdfPath: string,
  options: Pick<ConversionOptions, "analyzer" | "signal" | "onProgress"> = {}
): Promise<ActionResult<PageAnalysis[]>> {
  const startTime = performance.now();

  try {
    const bytes = await readFile(pdfPath);
    const { pages } = await extractDocument(bytes, {
      imagesDir: null,
      onProgress: options.onProgress,
    });
    const data = await analyzePages(
      pages,
      options.analyzer ?? StructureAnalyzer.disabled(),
      {
        filename: path.basename(pdfPath),
        signal: options.signal,
        onProgress: options.onProgress,
      }
    );
    return { data, error: null, processingTime: performance.now() - startTime };
  } catch (err) {
    console.error("MuPDF analysis error:", err);
    return {
      data: null,
      error: err instanceof Error ? err.message : "Failed to analyze PDF with MuPDF",
      processingTime: performance.now() - startTime,
    };
  }
}
