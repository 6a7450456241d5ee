/**
 * Labeled-section parser: handles model answers that put plain-text
 * headings ("Summary:", "Methodology:") around free text.
 */

export interface ParsedSections<L extends string> {
  /** Section body per label found; labels that never appear are absent. */
  sections: Map<L, string>;
  /** Text before the first label found (whole text if none found). */
  preamble: string;
}

/** Strip whitespace and bold markers left hanging around a heading; single `*` bullets stay. */
function clean(text: string): string {
  return text
    .trim()
    .replace(/^\*{2,}\s*/, "")
    .replace(/\s*\*{2,}$/, "")
    .replace(/^#+\s*/, "")
    .replace(/\s*#+$/, "")
    .trim();
}

/**
 * Locates each label as a literal substring (first occurrence), orders
 * the hits by offset and slices from the end of one label to the start
 * of the next.  Labels may appear in any order.
 */
export function parseLabeledSections<L extends string>(
  text: string,
  labels: readonly L[]
): ParsedSections<L> {
  const hits = labels
    .map((label) => ({ label, index: text.indexOf(label) }))
    .filter((hit) => hit.index !== -1)
    .sort((a, b) => a.index - b.index);

  const sections = new Map<L, string>();
  hits.forEach((hit, i) => {
    const start = hit.index + hit.label.length;
    const end = i + 1 < hits.length ? hits[i + 1].index : text.length;
    sections.set(hit.label, clean(text.slice(start, end)));
  });

  const preamble = hits.length > 0 ? clean(text.slice(0, hits[0].index)) : clean(text);

  return { sections, preamble };
}

/** Section text, or the fallback when missing or blank. */
export function sectionOr(value: string | undefined, fallback: string): string {
  return value && value.length > 0 ? value : fallback;
}
