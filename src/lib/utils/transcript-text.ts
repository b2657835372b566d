const PARENTHETICAL_REGEX = /\s*\([^)]*\)\s*/g;

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function normalizeCourseCode(value: string): string {
  return collapseWhitespace(value.replace(/\*/g, ""));
}

export function cleanCourseName(value: string): string {
  return collapseWhitespace(value.replace(PARENTHETICAL_REGEX, " "));
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function labelPattern(label: string): string {
  return label.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
}

export function parseDecimal(value: string | undefined): number | null {
  const normalized = value?.trim();
  if (!normalized) {
    return null;
  }
  const numeric = Number(normalized.replace(",", "."));
  return Number.isFinite(numeric) ? numeric : null;
}

export function dedupe<T>(items: T[]): T[] {
  return [...new Set(items)];
}
