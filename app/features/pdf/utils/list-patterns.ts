/**
 * List marker recognition and normalization.
 */

// ============================================================================
// PATTERNS
// ============================================================================

// Bullet glyphs: • ‣ ◦ ⁃ ∙ * - +
// Marker followed by whitespace, as used to classify a block as a list item
const BULLET_ITEM_PATTERN = /^\s*[•‣◦⁃∙*\-+]\s/;
const NUMBERED_ITEM_PATTERN = /^\s*\d+\.\s/;

// Already a valid markdown ordered item ("1. ", "12. ")
const ORDERED_MARKER_PATTERN = /^\d+\.\s/;

// Leading marker to strip, whitespace after it optional ("*Item", "3.Item")
const BULLET_STRIP_PATTERN = /^[•‣◦⁃∙*\-+]\s*/;
const NUMBER_STRIP_PATTERN = /^\d+\.(?!\d)\s*/;

// ============================================================================
// DETECTION
// ============================================================================

export function hasBulletMarker(text: string): boolean {
  return BULLET_ITEM_PATTERN.test(text);
}

export function hasNumberedMarker(text: string): boolean {
  return NUMBERED_ITEM_PATTERN.test(text);
}

/** True when the text opens with an explicit bullet or "N." marker */
export function hasListMarker(text: string): boolean {
  return hasBulletMarker(text) || hasNumberedMarker(text);
}

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * Rewrite a list item's text as a markdown list line.
 *
 * "• Item" → "- Item", "*Item" → "- Item", "3. Item" and "• 3. Item" become
 * "3. Item".
 * Returns an empty string when nothing is left after the marker.
 */
export function normalizeListItem(text: string): string {
  const trimmed = text.trim();
  if (ORDERED_MARKER_PATTERN.test(trimmed)) {
    return trimmed;
  }

  if (BULLET_STRIP_PATTERN.test(trimmed)) {
    const content = trimmed.replace(BULLET_STRIP_PATTERN, "").trim();
    // "• 3. Item" keeps its own number
    if (ORDERED_MARKER_PATTERN.test(content)) return content;
    return content ? `- ${content}` : "";
  }

  const content = trimmed.replace(NUMBER_STRIP_PATTERN, "").trim();

  return content ? `- ${content}` : "";
}
