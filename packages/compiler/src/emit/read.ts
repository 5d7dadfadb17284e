import type { RouteEntry } from "@liveroute/router";
import {
  LIVE_VIEW_KEY,
  type LiveRouteFullOptions,
  type LivePrivateMetadata,
  type LivePublicMetadata,
} from "../model/route.js";

/**
 * Live route data as seen by the dispatch layer.
 */
export interface LiveRouteInfo {
  readonly view: string;
  readonly options: LiveRouteFullOptions;
}

function isLivePrivateMetadata(value: unknown): value is LivePrivateMetadata {
  if (!Array.isArray(value) || value.length !== 2) return false;
  const [view, options]: unknown[] = value;
  return (
    typeof view === "string" &&
    typeof options === "object" &&
    options !== null &&
    "router" in options &&
    typeof options.router === "string" &&
    "layout" in options &&
    Array.isArray(options.layout)
  );
}

function isLivePublicMetadata(value: unknown): value is LivePublicMetadata {
  if (!Array.isArray(value) || value.length !== 2) return false;
  const [view, action]: unknown[] = value;
  return typeof view === "string" && (action === null || typeof action === "string");
}

/**
 * Read the live view and its full options back from a registered route.
 * Returns undefined for routes not registered by the live route compiler.
 */
export function liveRouteOf(route: RouteEntry): LiveRouteInfo | undefined {
  const value = route.private[LIVE_VIEW_KEY];
  if (!isLivePrivateMetadata(value)) return undefined;
  return { view: value[0], options: value[1] };
}

/**
 * Public (view, action) pair of a live route, for listings and tests.
 */
export function liveMetadataOf(route: RouteEntry): LivePublicMetadata | undefined {
  const value = route.metadata[LIVE_VIEW_KEY];
  return isLivePublicMetadata(value) ? value : undefined;
}
