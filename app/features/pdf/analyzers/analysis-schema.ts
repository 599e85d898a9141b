/**
 * Shape validation for external analysis responses.
 *
 * Only the top level can reject a response. Individual records are
 * defaulted or dropped one by one so a partly wrong answer is still used.
 */

import { z } from "zod";

import {
  SEMANTIC_TYPES,
  type BlockClassification,
  type ClassificationResult,
  type PageBlock,
} from "../types";
import { UNKNOWN_DOCUMENT_TITLE } from "../utils/heuristic-classifier";

export const DEFAULT_RECORD_CONFIDENCE = 0.5;
export const UNCLASSIFIED_REASONING = "Not classified by external analyzer";

// ============================================================================
// SCHEMAS
// ============================================================================

export const AnalysisRecordSchema = z.object({
  block_id: z.number().int().nonnegative(),
  type: z.enum(SEMANTIC_TYPES).catch("paragraph"),
  confidence: z.number().min(0).max(1).catch(DEFAULT_RECORD_CONFIDENCE),
  reasoning: z.string().catch(""),
});

const DocumentHierarchySchema = z.object({
  title: z.string().catch(UNKNOWN_DOCUMENT_TITLE),
  sections: z.array(z.string()).catch([]),
  has_toc: z.boolean().catch(false),
  document_type: z.string().catch("unknown"),
});

const DEFAULT_HIERARCHY: z.infer<typeof DocumentHierarchySchema> = {
  title: UNKNOWN_DOCUMENT_TITLE,
  sections: [],
  has_toc: false,
  document_type: "unknown",
};

export const AnalysisResponseSchema = z.object({
  structure: z.array(z.unknown()),
  document_hierarchy: DocumentHierarchySchema.catch(DEFAULT_HIERARCHY),
  formatting_notes: z.array(z.string()).catch([]),
});


// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Turn a raw external response into a classification of `blocks`.
 * Returns `null` when the top-level shape is unusable.
 */
export function parseAnalysisResponse(
  raw: unknown,
  blocks: PageBlock[]
): ClassificationResult | null {
  const parsed = AnalysisResponseSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const response = parsed.data;
  const byIndex = new Map<number, BlockClassification>();
  let dropped = 0;

  for (const entry of response.structure) {
    const record = AnalysisRecordSchema.safeParse(entry);
    if (!record.success) {
      dropped++;
      continue;
    }

    const { block_id, type, confidence, reasoning } = record.data;
    const block = blocks[block_id];
    if (!block || block.kind !== "text" || byIndex.has(block_id)) {
      dropped++;
      continue;
    }

    byIndex.set(block_id, {
      blockIndex: block_id,
      semanticType: type,
      confidence,
      reasoning,
    });
  }

  if (dropped > 0) {
    console.warn(
      `[analysis-schema] Dropped ${dropped} invalid record(s) from external analysis`
    );
  }

  // Every text block gets exactly one entry
  const classified: BlockClassification[] = [];
  blocks.forEach((block, blockIndex) => {
    if (block.kind !== "text") return;
    classified.push(
      byIndex.get(blockIndex) ?? {
        blockIndex,
        semanticType: "paragraph",
        confidence: 0,
        reasoning: UNCLASSIFIED_REASONING,
      }
    );
  });

  const hierarchy = response.document_hierarchy;
  return {
    blocks: classified,
    hierarchy: {
      title: hierarchy.title,
      sections: hierarchy.sections,
      hasTableOfContents: hierarchy.has_toc,
      documentType: hierarchy.document_type,
    },
    formattingNotes: response.formatting_notes,
    source: "external",
  };
}
