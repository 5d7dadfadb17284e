import { debug, splitIdentifier, toSnakeCase } from "@liveroute/shared";
import { DEFAULT_LIVE_ROUTE_CONFIG, type ResolvedLiveRouteCompilerConfig } from "../config.js";
import { LiveRouteError, LiveRouteErrorCode } from "../model/errors.js";

export interface InferredHelper {
  readonly helperName: string;
  readonly action: string | null;
}

/**
 * Infer the helper name of a live route.
 *
 * Without an action the route uses the implied helper (`live`). With an
 * action, the helper is built from the view reference: leading segments are
 * dropped up to the first one ending in the live suffix, and the rest are
 * stripped of the suffix and joined in snake_case.
 *
 * - "MyApp.ArticleLive.Index", "edit" → "article_index"
 * - "MyApp.FooBarLive.Nested.Index", "show" → "foo_bar_nested_index"
 */
export function inferHelperName(
  view: string,
  action: string | null,
  config: ResolvedLiveRouteCompilerConfig = DEFAULT_LIVE_ROUTE_CONFIG,
): InferredHelper {
  if (action === null) {
    return { helperName: config.impliedHelperName, action: null };
  }

  const suffix = config.liveSuffix;
  const segments = splitIdentifier(view);
  const start = segments.findIndex((segment) => segment.endsWith(suffix));

  const helperName = start < 0
    ? ""
    : segments
        .slice(start)
        .map((segment) => toSnakeCase(stripSuffix(segment, suffix)))
        // A bare suffix segment leaves no token and is skipped
        .filter((token) => token.length > 0)
        .join("_");

  if (!helperName) {
    throw new LiveRouteError(
      `could not infer the helper name because an action was given and the view ${view} ` +
        `has no "${suffix}" suffix. Pass the "as" option explicitly or name the view like ` +
        `"Foo${suffix}" or "Foo${suffix}.Index"`,
      LiveRouteErrorCode.HELPER_NAME_INFERENCE,
      view,
    );
  }

  debug.live("inferred.helper", { view, action, helperName });
  return { helperName, action };
}

function stripSuffix(segment: string, suffix: string): string {
  return segment.endsWith(suffix) ? segment.slice(0, -suffix.length) : segment;
}
