// Conversion actions
export {
  analyzePdfStructureAction,
  convertPdfFileToMarkdown,
  convertPdfToMarkdownAction,
  extractDocument,
} from "./actions/mupdf-actions";

export type {
  ActionResult,
  ConversionData,
  ConversionOptions,
  ExtractedDocument,
} from "./actions/mupdf-actions";

export { analyzePages, convertPagesToMarkdown } from "./actions/markdown-actions";
export type { PageAnalysis, PageConversion } from "./actions/markdown-actions";

// Structure analysis
export { StructureAnalyzer } from "./utils/structure-analyzer";
export type { AnalyzerMode } from "./utils/structure-analyzer";
export { classifyBlocks } from "./utils/heuristic-classifier";
export {
  createStructureAnalyzer,
  isAnalyzerChoice,
  ANALYZER_CHOICES,
} from "./analyzers/create-analyzer";
export type { AnalyzerChoice } from "./analyzers/create-analyzer";
export type { AnalysisCallback, ExchangeChannel } from "./analyzers/types";

// Rendering
export {
  InvalidBlockIndexError,
  PAGE_SEPARATOR,
  renderPageMarkdown,
} from "./utils/markdown-renderer";
export { attachLinks } from "./utils/link-overlay";

// Types
export type {
  ClassificationResult,
  DocumentHierarchy,
  ExtractedPage,
  PageBlock,
  PageContext,
  SemanticType,
} from "./types";
