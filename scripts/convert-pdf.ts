/**
 * Convert a PDF to Markdown
 *
 * Usage: npx tsx scripts/convert-pdf.ts <path-to-pdf> [options]
 *
 *   -o, --output <dir>   Output directory (default: next to the PDF)
 *   -n, --name <file>    Output file name (default: <pdf name>.md)
 *   --no-images          Skip image extraction
 *   --analyzer <mode>    none | interactive | openai (default: none)
 *   --analyze-only       Print the detected structure instead of converting
 *
 * Example: npx tsx scripts/convert-pdf.ts ~/Documents/sample.pdf --analyzer interactive
 */

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";

import { loadAnalyzerConfig } from "@/app/lib/config";
import {
  analyzePdfStructureAction,
  convertPdfFileToMarkdown,
  createStructureAnalyzer,
  isAnalyzerChoice,
  type StructureAnalyzer,
} from "@/app/features/pdf";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    output: { type: "string", short: "o" },
    name: { type: "string", short: "n" },
    "no-images": { type: "boolean", default: false },
    analyzer: { type: "string", default: "none" },
    "analyze-only": { type: "boolean", default: false },
  },
});

async function main(): Promise<number> {
  const pdfPath = positionals[0];
  if (!pdfPath) {
    console.error("Usage: npx tsx scripts/convert-pdf.ts <path-to-pdf> [options]");
    return 1;
  }

  const absolutePath = path.resolve(pdfPath);
  if (!fs.existsSync(absolutePath)) {
    console.error(`❌ File not found: ${absolutePath}`);
    return 1;
  }

  const choice = values.analyzer;
  if (!isAnalyzerChoice(choice)) {
    console.error(`❌ Unknown analyzer "${choice}" (expected none, interactive or openai)`);
    return 1;
  }

  const analyzer = createStructureAnalyzer(choice, loadAnalyzerConfig());
  const controller = new AbortController();
  // First Ctrl-C stops external analysis, remaining pages use heuristics
  process.on("SIGINT", () => {
    if (controller.signal.aborted) process.exit(130);
    console.warn("\n🛑 Analysis interrupted by user");
    controller.abort();
  });

  try {
    return await run(absolutePath, analyzer, controller.signal);
  } finally {
    analyzer.close();
  }
}

async function run(
  absolutePath: string,
  analyzer: StructureAnalyzer,
  signal: AbortSignal
): Promise<number> {
  const onProgress = (message: string) => console.log(`📄 ${message}`);

  if (values["analyze-only"]) {
    const result = await analyzePdfStructureAction(absolutePath, {
      analyzer,
      signal,
      onProgress,
    });
    if (!result.data) {
      console.error(`❌ Analysis failed: ${result.error}`);
      return 1;
    }
    const summary = result.data.map((page) => ({
      pageNumber: page.pageNumber,
      ...page.classification,
    }));
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  const outputPath = await convertPdfFileToMarkdown(absolutePath, {
    outputDir: values.output ? path.resolve(values.output) : undefined,
    outputName: values.name,
    extractImages: !values["no-images"],
    analyzer,
    signal,
    onProgress,
  });

  console.log(`\n✅ Conversion completed successfully!`);
  console.log(`📁 Output file: ${outputPath}`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("❌ Error during conversion:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
