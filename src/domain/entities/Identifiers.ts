const WHITESPACE_PATTERN = /\s/;

/** Non-empty and free of whitespace */
export function isValidIdentifier(id: unknown): id is string {
  return typeof id === "string" && id.length > 0 && !WHITESPACE_PATTERN.test(id);
}
