/**
 * Convert an identifier segment to snake_case.
 * "FooBar" → "foo_bar"
 * "HTTPServer" → "http_server"
 * "Foo1Bar" → "foo1_bar"
 */
export function toSnakeCase(value: string): string {
  return value
    // Spaces and hyphens become underscores
    .replace(/[\s-]+/g, "_")
    // Split a run of capitals from the word that follows: "HTTPServer" → "HTTP_Server"
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    // Split lowercase/digit from a following capital: "fooBar" → "foo_Bar"
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/_+/g, "_")
    .toLowerCase();
}

const SEGMENT_PATTERN = /^[A-Z][A-Za-z0-9_]*$/;

/**
 * Split a dotted identifier into its segments.
 * "MyApp.ArticleLive.Index" → ["MyApp", "ArticleLive", "Index"]
 */
export function splitIdentifier(identifier: string): string[] {
  return identifier.split(".");
}

/**
 * Join segments into a dotted identifier, skipping empty ones.
 */
export function concatIdentifier(...segments: readonly string[]): string {
  return segments
    .flatMap((s) => s.split("."))
    .filter((s) => s.length > 0)
    .join(".");
}

/**
 * Check that every segment of a dotted identifier starts with a capital and
 * holds only word characters.
 */
export function isIdentifier(value: string): boolean {
  if (!value) return false;
  return splitIdentifier(value).every((segment) => SEGMENT_PATTERN.test(segment));
}

/**
 * Check for a snake_case helper name ("article_index", "live", "custom_live").
 */
export function isHelperName(value: string): boolean {
  return /^[a-z_][a-z0-9_]*$/.test(value);
}
