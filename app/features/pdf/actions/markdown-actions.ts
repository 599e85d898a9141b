import type {
  ClassificationResult,
  ExtractedPage,
  PageBlock,
  PageContext,
} from "../types";
import { attachLinks } from "../utils/link-overlay";
import { joinPages, renderPageMarkdown } from "../utils/markdown-renderer";
import type { StructureAnalyzer } from "../utils/structure-analyzer";

export interface PageConversion {
  pageNumber: number;
  markdown: string;
  classification: ClassificationResult;
}

export interface PageAnalysis {
  pageNumber: number;
  blocks: PageBlock[];
  classification: ClassificationResult;
}

export interface ConvertPagesOptions {
  filename: string;
  signal?: AbortSignal;
  onProgress?: (message: string) => void;
}

function pageContext(
  page: ExtractedPage,
  filename: string,
  totalPages: number
): PageContext {
  return { filename, pageNumber: page.pageNumber, totalPages };
}

/**
 * Attach links, classify, then render a single page
 */
export async function convertPageToMarkdown(
  page: ExtractedPage,
  analyzer: StructureAnalyzer,
  context: PageContext,
  signal?: AbortSignal
): Promise<PageConversion> {
  const blocks = attachLinks(page.blocks, page.links);
  const classification = await analyzer.analyze(blocks, context, { signal });
  const markdown = renderPageMarkdown(blocks, classification, page.imageRefs);

  return { pageNumber: page.pageNumber, markdown, classification };
}

/**
 * Convert pages one after another (an interactive analyzer can only
 * handle one page at a time) and join them in page order.
 */
export async function convertPagesToMarkdown(
  pages: ExtractedPage[],
  analyzer: StructureAnalyzer,
  options: ConvertPagesOptions
): Promise<{ markdown: string; pages: PageConversion[] }> {
  const conversions: PageConversion[] = [];

  for (const page of pages) {
    options.onProgress?.(`Converting page ${page.pageNumber}/${pages.length}...`);
    conversions.push(
      await convertPageToMarkdown(
        page,
        analyzer,
        pageContext(page, options.filename, pages.length),
        options.signal
      )
    );
  }

  return {
    markdown: joinPages(conversions.map((conversion) => conversion.markdown)),
    pages: conversions,
  };
}

/**
 * Classification only, without rendering
 */
export async function analyzePages(
  pages: ExtractedPage[],
  analyzer: StructureAnalyzer,
  options: ConvertPagesOptions
): Promise<PageAnalysis[]> {
  const analyses: PageAnalysis[] = [];

  for (const page of pages) {
    options.onProgress?.(`Analyzing page ${page.pageNumber}/${pages.length}...`);
    const blocks = attachLinks(page.blocks, page.links);
    const classification = await analyzer.analyze(
      blocks,
      pageContext(page, options.filename, pages.length),
      { signal: options.signal }
    );
    analyses.push({ pageNumber: page.pageNumber, blocks, classification });
  }

  return analyses;
}
