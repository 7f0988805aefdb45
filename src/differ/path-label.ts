/**
 * Derives the label of a child value from its parent's label.
 *
 * Field names are joined with a dot (`outer.inner`), bracket segments
 * (`[0]`, `["key"]`) are appended as-is, and the root label is empty, so a
 * top-level field carries no leading dot. Labels are plain strings; the
 * parent label is never modified.
 *
 * @param parent - The label of the containing value (`''` at the root).
 * @param segment - A field name or a bracketed index/key.
 */
export function relabel(parent: string, segment: string): string {
  if (parent === '' || segment.startsWith('[')) {
    return parent + segment;
  }
  return `${parent}.${segment}`;
}

export function indexSegment(index: number): string {
  return `[${index}]`;
}

export function keySegment(renderedKey: string): string {
  return `[${renderedKey}]`;
}

/**
 * Builds the format template of one diff line: the label and its `: `
 * separator (omitted at the root) followed by the body template.
 *
 * A `%` inside the label is doubled so that printf-style substitution treats
 * it as a literal character.
 */
export function withLabel(label: string, template: string): string {
  if (label === '') return template;
  return `${label.replace(/%/g, '%%')}: ${template}`;
}
