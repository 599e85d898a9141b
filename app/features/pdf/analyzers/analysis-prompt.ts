import type { PageBlock, PageContext } from "../types";
import { getBlockSignals } from "../utils/block-signals";

export const ANALYSIS_SYSTEM_PROMPT =
  "You are a precise document structure analyzer that returns only valid JSON responses.";

const CLASSIFICATION_TYPES = `**Classification Types:**
- \`title\`: Main document title
- \`heading1\`: Primary section headers
- \`heading2\`: Secondary section headers
- \`heading3\`: Tertiary section headers
- \`heading4\`: Quaternary section headers
- \`paragraph\`: Regular body text
- \`list_item\`: Bulleted or numbered list items
- \`table_cell\`: Table content
- \`caption\`: Image or table captions
- \`metadata\`: Headers, footers, page numbers
- \`other\`: Unclassified content`;

const RESPONSE_FORMAT = `Please provide your analysis as a JSON object:

\`\`\`json
{
  "structure": [
    {
      "block_id": 0,
      "type": "heading1",
      "confidence": 0.95,
      "reasoning": "Large font size, positioned prominently"
    },
    {
      "block_id": 1,
      "type": "paragraph",
      "confidence": 0.8,
      "reasoning": "Standard body text formatting"
    }
  ],
  "document_hierarchy": {
    "title": "Detected Document Title",
    "sections": ["Section 1", "Section 2"],
    "has_toc": false,
    "document_type": "article|manual|report|other"
  },
  "formatting_notes": [
    "Consistent heading hierarchy detected",
    "List formatting needs normalization"
  ]
}
\`\`\`

\`block_id\` is the number shown after "Block". Output ONLY the JSON, no other text.`;

const ADDITIONAL_GUIDANCE = `- Consider font sizes, positioning, and content patterns
- Look for hierarchical relationships between headings
- Identify list patterns and table structures
- Note any formatting inconsistencies that need correction`;

function formatCoordinate(value: number): string {
  return value.toFixed(1);
}

/**
 * One entry per text block, numbered by its index in the page's block
 * sequence (image blocks keep their index but are not listed).
 */
export function describeBlocks(blocks: PageBlock[]): string {
  const entries: string[] = [];

  blocks.forEach((block, index) => {
    if (block.kind !== "text") return;

    const signals = getBlockSignals(block);
    const tags: string[] = [];
    if (signals.isBold) tags.push("BOLD");
    if (signals.isItalic) tags.push("ITALIC");

    const formatting = tags.length > 0 ? ` [${tags.join(", ")}]` : "";
    const { x0, y0, x1, y1 } = block.bbox;
    const position = [x0, y0, x1, y1].map(formatCoordinate).join(", ");

    entries.push(
      [
        `Block ${index}: Font: ${signals.avgFontSize.toFixed(1)}pt${formatting} | Position: [${position}]`,
        `Text: ${signals.text.trim()}`,
        `Fonts: ${signals.fonts.join(", ")}`,
      ].join("\n")
    );
  });

  return entries.join("\n\n");
}

export function buildAnalysisPrompt(
  blocks: PageBlock[],
  context: PageContext
): string {
  const textBlockCount = blocks.filter((block) => block.kind === "text").length;

  return `# PDF Document Structure Analysis Request

## Document Context
- **File**: ${context.filename}
- **Page**: ${context.pageNumber} of ${context.totalPages}
- **Text Blocks**: ${textBlockCount} blocks detected

## Analysis Task
Please analyze the following text blocks extracted from a PDF and classify each block's semantic role.

${CLASSIFICATION_TYPES}

## Text Blocks to Analyze
${describeBlocks(blocks)}

## Expected Response Format
${RESPONSE_FORMAT}

## Additional Guidance
${ADDITIONAL_GUIDANCE}
`;
}
