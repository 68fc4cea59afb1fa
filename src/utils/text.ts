const INVISIBLE_CHARACTERS = /[\u00AD\u200B-\u200F\u2060\uFEFF]/g;

function clampMaxLength(maxLength: number): number {
  if (!Number.isFinite(maxLength)) {
    return 0;
  }
  return Math.max(0, Math.floor(maxLength));
}

export function collapseWhitespace(value: string): string {
  return value.replace(INVISIBLE_CHARACTERS, '').trim().replace(/\s+/g, ' ');
}

export function normalizeBoundedText(value: unknown, maxLength: number): string {
  if (typeof value !== 'string' || value.length === 0) {
    return '';
  }
  return collapseWhitespace(value).slice(0, clampMaxLength(maxLength));
}

/**
 * Normalizes a runtime list of tag strings: non-strings and blank tags are dropped,
 * duplicates keep their first position.
 */
export function normalizeTagList(value: unknown, maxLength: number): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const seen = new Set<string>();
  const tags: string[] = [];
  for (const item of value) {
    const tag = normalizeBoundedText(item, maxLength);
    if (tag.length === 0 || seen.has(tag)) {
      continue;
    }
    seen.add(tag);
    tags.push(tag);
  }
  return tags;
}
