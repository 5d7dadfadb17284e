import type { LayoutSpec } from "@liveroute/router";
import { concatIdentifier, debug, splitIdentifier } from "@liveroute/shared";
import { DEFAULT_LIVE_ROUTE_CONFIG, type ResolvedLiveRouteCompilerConfig } from "../config.js";

/**
 * Infer the default layout from the router namespace.
 * "MyAppWeb.Router" → ["MyAppWeb.LayoutView", "app"]
 */
export function inferLayout(
  routerNamespace: string,
  config: ResolvedLiveRouteCompilerConfig = DEFAULT_LIVE_ROUTE_CONFIG,
): LayoutSpec {
  const parent = splitIdentifier(routerNamespace).slice(0, -1);
  const layoutView = concatIdentifier(...parent, config.layoutViewSegment);
  const layout: LayoutSpec = Object.freeze([layoutView, config.layoutTemplate] as const);

  debug.live("inferred.layout", { router: routerNamespace, layoutView });
  return layout;
}
