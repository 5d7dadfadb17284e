import type { RouteTable } from "./table.js";

/**
 * Render a route listing, one route per line:
 *
 * ```
 *   article_index_path  GET  /articles/:id/edit  LiveView.Plug  edit
 * ```
 *
 * Helper names are right-aligned; the other columns are left-aligned.
 */
export function formatRoutes(table: RouteTable): string {
  const rows = table.routes.map((r) => [`${r.helper}_path`, r.verb, r.path, r.handler, r.action] as const);
  if (rows.length === 0) return "";

  const widths = [0, 1, 2, 3].map((col) => Math.max(...rows.map((row) => row[col]?.length ?? 0)));

  return rows
    .map((row) =>
      [
        row[0].padStart(widths[0] ?? 0),
        row[1].padEnd(widths[1] ?? 0),
        row[2].padEnd(widths[2] ?? 0),
        row[3].padEnd(widths[3] ?? 0),
        row[4],
      ].join("  "),
    )
    .join("\n");
}
