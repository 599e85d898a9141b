import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";

import { imageBlock, simpleBlock } from "../testing/fixtures";
import {
  DEFAULT_RECORD_CONFIDENCE,
  UNCLASSIFIED_REASONING,
  parseAnalysisResponse,
} from "./analysis-schema";

const blocks = [simpleBlock("Title"), simpleBlock("Body"), imageBlock()];

let warn: MockInstance<typeof console.warn>;

beforeEach(() => {
  warn = vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseAnalysisResponse", () => {
  it.each<unknown>([null, "text", 42, true, {}, { structure: "none" }])("rejects %j", (raw) => {
    expect(parseAnalysisResponse(raw, blocks)).toBeNull();
  });

  it("accepts an empty structure and classifies every text block as unclassified", () => {
    const result = parseAnalysisResponse({ structure: [] }, blocks);

    expect(result?.blocks).toEqual([
      { blockIndex: 0, semanticType: "paragraph", confidence: 0, reasoning: UNCLASSIFIED_REASONING },
      { blockIndex: 1, semanticType: "paragraph", confidence: 0, reasoning: UNCLASSIFIED_REASONING },
    ]);
    expect(result?.hierarchy).toEqual({
      title: "Unknown Document",
      sections: [],
      hasTableOfContents: false,
      documentType: "unknown",
    });
    expect(result?.formattingNotes).toEqual([]);
    expect(result?.source).toBe("external");
  });

  it("defaults unknown types, out-of-range confidence and missing reasoning", () => {
    const result = parseAnalysisResponse(
      {
        structure: [
          { block_id: 0, type: "sidebar", confidence: 0.8, reasoning: "r" },
          { block_id: 1, type: "heading3", confidence: 1.5 },
        ],
      },
      blocks
    );

    expect(result?.blocks).toEqual([
      { blockIndex: 0, semanticType: "paragraph", confidence: 0.8, reasoning: "r" },
      { blockIndex: 1, semanticType: "heading3", confidence: DEFAULT_RECORD_CONFIDENCE, reasoning: "" },
    ]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("drops records that do not point at a text block", () => {
    const result = parseAnalysisResponse(
      {
        structure: [
          { block_id: 0, type: "title" },
          { block_id: 0, type: "heading1" },
          { block_id: 2, type: "caption" },
          { block_id: 9, type: "paragraph" },
          { block_id: -1, type: "paragraph" },
          { block_id: "1", type: "paragraph" },
          "garbage",
        ],
      },
      blocks
    );

    expect(result?.blocks.map((entry) => [entry.blockIndex, entry.semanticType])).toEqual([
      [0, "title"],
      [1, "paragraph"],
    ]);
    expect(result?.blocks[1].reasoning).toBe(UNCLASSIFIED_REASONING);
    expect(warn).toHaveBeenCalledWith("[analysis-schema] Dropped 6 invalid record(s) from external analysis");
  });

  it("keeps a partial hierarchy and falls back field by field", () => {
    const result = parseAnalysisResponse(
      {
        structure: [],
        document_hierarchy: { title: "Handbook", sections: "none", has_toc: true },
        formatting_notes: ["two columns"],
      },
      blocks
    );

    expect(result?.hierarchy).toEqual({
      title: "Handbook",
      sections: [],
      hasTableOfContents: true,
      documentType: "unknown",
    });
    expect(result?.formattingNotes).toEqual(["two columns"]);
  });
});
