import { RouterError, RouterErrorCode } from "./errors.js";

export type PathParam = string | number;
export type QueryParams = Readonly<Record<string, string | number | boolean>>;

/**
 * Throw unless a route or scope path begins with "/".
 */
export function assertRoutePath(path: string): void {
  if (!path.startsWith("/")) {
    throw new RouterError(
      `router paths must begin with /, got: ${JSON.stringify(path)}`,
      RouterErrorCode.INVALID_PATH,
    );
  }
}

/**
 * Split a path into its non-empty segments.
 */
export function pathSegments(path: string): string[] {
  return path.split("/").filter((s) => s.length > 0);
}

/**
 * Join a scope prefix and a route path.
 * joinPath("/admin", "/users/:id") → "/admin/users/:id"
 * joinPath("/", "/") → "/"
 */
export function joinPath(prefix: string, path: string): string {
  return "/" + [...pathSegments(prefix), ...pathSegments(path)].join("/");
}

/**
 * Names of the dynamic segments of a path, in order.
 * "/articles/:id/comments/*rest" → ["id", "rest"]
 */
export function dynamicSegments(path: string): string[] {
  return pathSegments(path)
    .filter((s) => s.startsWith(":") || s.startsWith("*"))
    .map((s) => s.slice(1));
}

/**
 * Build a concrete path by substituting params positionally into the dynamic
 * segments of a pattern, then appending an optional query string.
 */
export function buildPath(
  pattern: string,
  params: readonly PathParam[],
  query?: QueryParams,
): string {
  const expected = dynamicSegments(pattern);
  if (expected.length !== params.length) {
    throw new RouterError(
      `path ${pattern} expects ${expected.length} param(s) (${expected.join(", ") || "none"}), got ${params.length}`,
      RouterErrorCode.PARAM_MISMATCH,
    );
  }

  let index = 0;
  const segments = pathSegments(pattern).map((segment) => {
    if (segment.startsWith(":")) {
      return encodeURIComponent(String(params[index++]));
    }
    if (segment.startsWith("*")) {
      // Glob params keep their slashes
      return String(params[index++])
        .split("/")
        .map((part) => encodeURIComponent(part))
        .join("/");
    }
    return segment;
  });

  const base = "/" + segments.join("/");
  if (!query) return base;

  const search = new URLSearchParams(
    Object.entries(query).map(([key, value]): [string, string] => [key, String(value)]),
  ).toString();
  return search ? `${base}?${search}` : base;
}
