/** Separator Gmail uses for nested labels. */
export const LABEL_SEPARATOR = "/";

const MBOX_SUFFIX = ".mbox";

/**
 * Strip a trailing `.mbox` from a directory or file name.
 */
export function stripMboxSuffix(name: string): string {
  return name.toLowerCase().endsWith(MBOX_SUFFIX)
    ? name.slice(0, -MBOX_SUFFIX.length)
    : name;
}

/**
 * Turn a directory or file name into one label component: the separator
 * cannot appear inside a component, and surrounding whitespace is dropped.
 */
export function sanitizeLabelComponent(name: string): string {
  return stripMboxSuffix(name)
    .split(LABEL_SEPARATOR)
    .join("_")
    .replace(/\s+/g, " ")
    .trim();
}

export function joinLabelPath(labelPath: readonly string[]): string {
  return labelPath.join(LABEL_SEPARATOR);
}

/**
 * Every prefix of a label, shortest first: `A/B/C` → `A`, `A/B`, `A/B/C`.
 */
export function labelAncestors(label: string): string[] {
  const parts = label.split(LABEL_SEPARATOR);
  return parts.map((_, i) => parts.slice(0, i + 1).join(LABEL_SEPARATOR));
}
