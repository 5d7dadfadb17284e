/**
 * Live Route Compiler - Default Values and Normalization
 *
 * The naming conventions the compiler relies on are configurable; the
 * defaults describe the usual `FooLive` / `MyAppWeb.LayoutView` layout.
 */

import { isHelperName, isIdentifier } from "@liveroute/shared";
import { LiveRouteError, LiveRouteErrorCode } from "./model/errors.js";

export interface LiveRouteCompilerConfig {
  /**
   * Segment suffix that marks a routable live view.
   * @default "Live"
   */
  liveSuffix?: string;

  /**
   * Helper name of routes declared without an action.
   * @default "live"
   */
  impliedHelperName?: string;

  /**
   * Segment appended to the router's parent namespace to find the layout view.
   * @default "LayoutView"
   */
  layoutViewSegment?: string;

  /**
   * Template of the inferred layout.
   * @default "app"
   */
  layoutTemplate?: string;

  /**
   * Handler registered for every live route.
   * @default "LiveView.Plug"
   */
  handler?: string;
}

export type ResolvedLiveRouteCompilerConfig = Readonly<Required<LiveRouteCompilerConfig>>;

export const DEFAULT_LIVE_ROUTE_CONFIG: ResolvedLiveRouteCompilerConfig = Object.freeze({
  liveSuffix: "Live",
  impliedHelperName: "live",
  layoutViewSegment: "LayoutView",
  layoutTemplate: "app",
  handler: "LiveView.Plug",
});

/**
 * Apply defaults and check that every convention is usable.
 */
export function normalizeLiveRouteConfig(
  config: LiveRouteCompilerConfig | undefined,
): ResolvedLiveRouteCompilerConfig {
  if (!config) return DEFAULT_LIVE_ROUTE_CONFIG;

  const resolved: ResolvedLiveRouteCompilerConfig = Object.freeze({
    liveSuffix: config.liveSuffix ?? DEFAULT_LIVE_ROUTE_CONFIG.liveSuffix,
    impliedHelperName: config.impliedHelperName ?? DEFAULT_LIVE_ROUTE_CONFIG.impliedHelperName,
    layoutViewSegment: config.layoutViewSegment ?? DEFAULT_LIVE_ROUTE_CONFIG.layoutViewSegment,
    layoutTemplate: config.layoutTemplate ?? DEFAULT_LIVE_ROUTE_CONFIG.layoutTemplate,
    handler: config.handler ?? DEFAULT_LIVE_ROUTE_CONFIG.handler,
  });

  if (!/^[A-Z][A-Za-z0-9]*$/.test(resolved.liveSuffix)) {
    throw invalidConfig("liveSuffix", resolved.liveSuffix, "a capitalized word such as \"Live\"");
  }
  if (!isHelperName(resolved.impliedHelperName)) {
    throw invalidConfig("impliedHelperName", resolved.impliedHelperName, "a snake_case helper name");
  }
  if (!isIdentifier(resolved.layoutViewSegment) || resolved.layoutViewSegment.includes(".")) {
    throw invalidConfig("layoutViewSegment", resolved.layoutViewSegment, "a single identifier segment");
  }
  if (!resolved.layoutTemplate) {
    throw invalidConfig("layoutTemplate", resolved.layoutTemplate, "a non-empty template name");
  }
  if (!isIdentifier(resolved.handler)) {
    throw invalidConfig("handler", resolved.handler, "a dotted identifier");
  }
  return resolved;
}

function invalidConfig(key: string, value: string, expected: string): LiveRouteError {
  return new LiveRouteError(
    `invalid live route config ${key}: ${JSON.stringify(value)}; expected ${expected}`,
    LiveRouteErrorCode.INVALID_CONFIG,
  );
}
