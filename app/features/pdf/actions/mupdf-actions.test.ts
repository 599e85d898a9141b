import { createHash } from "node:crypto";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { FONT_FLAGS, type TextBlock } from "../types";
import {
  PageBlockCollector,
  extractPageLinks,
  packColor,
  parseFontFlags,
  saveImages,
} from "./mupdf-actions";

const CHAR_WIDTH = 5;

function quad(x0: number, y0: number, x1: number, y1: number): number[] {
  return [x0, y0, x1, y0, x0, y1, x1, y1];
}

function addWord(
  collector: PageBlockCollector,
  word: string,
  x: number,
  font = "Helvetica",
  flags = 0,
  color = 0
): void {
  [...word].forEach((c, i) => {
    const left = x + i * CHAR_WIDTH;
    collector.addChar(c, font, 11, flags, color, quad(left, 100, left + CHAR_WIDTH, 112));
  });
}

function onlyTextBlock(collector: PageBlockCollector): TextBlock {
  const [block] = collector.blocks;
  if (block?.kind !== "text") throw new Error("expected a text block");
  return block;
}

describe("parseFontFlags", () => {
  it.each<[string, boolean, boolean, number]>([
    ["Helvetica", false, false, 0],
    ["Helvetica-Bold", false, false, FONT_FLAGS.BOLD],
    ["ABCDEF+Arial,Bd", false, false, FONT_FLAGS.BOLD],
    ["Times-Italic", false, false, FONT_FLAGS.ITALIC],
    ["Courier-Oblique", false, false, FONT_FLAGS.ITALIC],
    ["Helvetica-BoldOblique", false, false, FONT_FLAGS.BOLD | FONT_FLAGS.ITALIC],
    ["Arial", true, true, FONT_FLAGS.BOLD | FONT_FLAGS.ITALIC],
  ])("%s (bold=%s, italic=%s) -> %d", (fontName, isBold, isItalic, expected) => {
    expect(parseFontFlags(fontName, isBold, isItalic)).toBe(expected);
  });
});

describe("PageBlockCollector", () => {
  it("groups characters with the same style into spans", () => {
    const collector = new PageBlockCollector();
    collector.beginTextBlock([72, 100, 300, 112]);
    collector.beginLine([72, 100, 300, 112]);
    addWord(collector, "Plain", 72);
    addWord(collector, "Bold", 97, "Helvetica-Bold", FONT_FLAGS.BOLD);
    collector.endLine();
    collector.endTextBlock();

    const block = onlyTextBlock(collector);
    expect(block.bbox).toEqual({ x0: 72, y0: 100, x1: 300, y1: 112 });
    expect(block.lines[0].spans).toEqual([
      { text: "Plain", font: "Helvetica", size: 11, flags: 0, color: 0, bbox: { x0: 72, y0: 100, x1: 97, y1: 112 } },
      {
        text: "Bold",
        font: "Helvetica-Bold",
        size: 11,
        flags: FONT_FLAGS.BOLD,
        color: 0,
        bbox: { x0: 97, y0: 100, x1: 117, y1: 112 },
      },
    ]);
  });

  it("starts a new span when the color changes", () => {
    const collector = new PageBlockCollector();
    collector.beginTextBlock([72, 100, 300, 112]);
    collector.beginLine([72, 100, 300, 112]);
    addWord(collector, "black", 72);
    addWord(collector, "red", 97, "Helvetica", 0, 0xff0000);
    collector.endLine();
    collector.endTextBlock();

    expect(onlyTextBlock(collector).lines[0].spans.map((span) => [span.text, span.color])).toEqual([
      ["black", 0],
      ["red", 0xff0000],
    ]);
  });

  it("adds a space between lines unless one is already there or the line is hyphenated", () => {
    const collector = new PageBlockCollector();
    collector.beginTextBlock([72, 100, 300, 148]);
    for (const word of ["first", "second ", "hyphen-", "last"]) {
      collector.beginLine([72, 100, 300, 112]);
      addWord(collector, word, 72);
      collector.endLine();
    }
    collector.endTextBlock();

    const texts = onlyTextBlock(collector).lines.map((line) => line.spans.map((span) => span.text).join(""));
    expect(texts).toEqual(["first ", "second ", "hyphen-", "last"]);
  });

  it("skips empty lines and empty blocks", () => {
    const collector = new PageBlockCollector();
    collector.beginTextBlock([0, 0, 10, 10]);
    collector.beginLine([0, 0, 10, 10]);
    collector.endLine();
    collector.endTextBlock();

    collector.addChar("x", "Helvetica", 11, 0, 0, quad(0, 0, 5, 5));

    expect(collector.blocks).toEqual([]);
  });

  it("records images as blocks in reading order", () => {
    const image = { toPixmap: () => ({ asPNG: () => new Uint8Array([1]) }) };
    const collector = new PageBlockCollector();
    collector.addImage([72, 200, 300, 400], image);
    collector.beginTextBlock([72, 420, 300, 432]);
    collector.beginLine([72, 420, 300, 432]);
    addWord(collector, "Caption", 72);
    collector.endLine();
    collector.endTextBlock();

    expect(collector.blocks.map((block) => block.kind)).toEqual(["image", "text"]);
    expect(collector.blocks[0].bbox).toEqual({ x0: 72, y0: 200, x1: 300, y1: 400 });
    expect(collector.images).toEqual([image]);
  });
});

describe("packColor", () => {
  it.each<[number[], number]>([
    [[1, 0, 0], 0xff0000],
    [[0, 0.5, 1], 0x0080ff],
    [[1], 0xffffff],
    [[0], 0x000000],
    [[0, 0, 0, 1], 0x000000],
    [[0, 1, 1, 0], 0xff0000],
    [[], 0],
  ])("packs %j as %d", (components, expected) => {
    expect(packColor(components)).toBe(expected);
  });
});

describe("extractPageLinks", () => {
  interface FakeLink {
    uri: string;
    external: boolean;
    getBounds(): number[];
    getURI(): string;
    isExternal(): boolean;
  }

  function fakeLink(uri: string, external: boolean): FakeLink {
    return {
      uri,
      external,
      getBounds: () => [10, 20, 110, 32],
      getURI: () => uri,
      isExternal: () => external,
    };
  }

  const rect = { x0: 10, y0: 20, x1: 110, y1: 32 };

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps the URI of external links", () => {
    const resolve = vi.fn(() => 0);

    expect(extractPageLinks([fakeLink("https://example.com/a", true)], resolve)).toEqual([
      { kind: "external", url: "https://example.com/a", rect },
    ]);
    expect(resolve).not.toHaveBeenCalled();
  });

  it("points resolved internal links at their page", () => {
    expect(extractPageLinks([fakeLink("#nameddest=intro", false)], () => 2)).toEqual([
      { kind: "internal", url: "#page-3", rect },
    ]);
  });

  it("uses a generic anchor for internal links that do not resolve", () => {
    const links = [fakeLink("#missing", false), fakeLink("#broken", false)];
    const resolve = (link: FakeLink) => {
      if (link.uri === "#broken") throw new Error("bad destination");
      return -1;
    };

    expect(extractPageLinks(links, resolve)).toEqual([
      { kind: "internal", url: "#internal-ref", rect },
      { kind: "internal", url: "#internal-ref", rect },
    ]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("marks links without a URI as other", () => {
    expect(extractPageLinks([fakeLink("", false)], () => 0)).toEqual([{ kind: "other", url: "", rect }]);
  });
});

describe("saveImages", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "pdf-images-"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function png(bytes: number[]) {
    return { toPixmap: () => ({ asPNG: () => new Uint8Array(bytes) }) };
  }

  function shortHash(bytes: number[]): string {
    return createHash("md5").update(new Uint8Array(bytes)).digest("hex").slice(0, 8);
  }

  it("writes PNG files named by page, index and content hash", async () => {
    const imagesDir = path.join(dir, "images");
    const broken = {
      toPixmap: (): { asPNG(): Uint8Array } => {
        throw new Error("unsupported colorspace");
      },
    };

    const refs = await saveImages([png([1, 2, 3]), broken, png([4, 5])], 3, imagesDir);

    expect(refs).toEqual([
      `images/image_3_0_${shortHash([1, 2, 3])}.png`,
      `images/image_3_2_${shortHash([4, 5])}.png`,
    ]);
    const written = await readFile(path.join(dir, refs[0]));
    expect([...written]).toEqual([1, 2, 3]);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("does nothing for a page without images", async () => {
    const imagesDir = path.join(dir, "images");

    expect(await saveImages([], 1, imagesDir)).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
  });
});
