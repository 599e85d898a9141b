import {
  FONT_FLAGS,
  type BoundingBox,
  type ImageBlock,
  type TextBlock,
  type TextSpan,
} from "../types";

export function box(x0: number, y0: number, x1: number, y1: number): BoundingBox {
  return { x0, y0, x1, y1 };
}

export function span(
  text: string,
  overrides: Partial<Omit<TextSpan, "text">> = {}
): TextSpan {
  return {
    text,
    font: "Helvetica",
    size: 11,
    flags: 0,
    bbox: box(72, 100, 72 + text.length * 5, 112),
    ...overrides,
  };
}

export function boldSpan(
  text: string,
  overrides: Partial<Omit<TextSpan, "text">> = {}
): TextSpan {
  return span(text, { font: "Helvetica-Bold", flags: FONT_FLAGS.BOLD, ...overrides });
}

/** Text block with one line per span list */
export function textBlock(lines: TextSpan[][], bbox: BoundingBox = box(72, 100, 540, 112)): TextBlock {
  return {
    kind: "text",
    bbox,
    lines: lines.map((spans) => ({ bbox, spans })),
  };
}

interface SimpleBlockOptions {
  size?: number;
  bold?: boolean;
  x0?: number;
}

/** Single-span, single-line text block */
export function simpleBlock(text: string, options: SimpleBlockOptions = {}): TextBlock {
  const x0 = options.x0 ?? 72;
  const size = options.size ?? 11;
  const make = options.bold ? boldSpan : span;
  return textBlock([[make(text, { size })]], box(x0, 100, 540, 100 + size));
}

export function imageBlock(bbox: BoundingBox = box(72, 200, 300, 400)): ImageBlock {
  return { kind: "image", bbox };
}
