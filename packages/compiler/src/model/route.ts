/* =======================================================================================
 * LIVE ROUTE MODEL
 * ---------------------------------------------------------------------------------------
 * Input declarations, resolved descriptors, and the shape emitted to the host router.
 * Pure type definitions.
 * ======================================================================================= */

import type {
  AddRouteOptions,
  ContainerSpec,
  GroupOptions,
  HttpVerb,
  LayoutSpec,
  RouteEntry,
} from "@liveroute/router";

/** Key under which live route data is stored in route private data and metadata */
export const LIVE_VIEW_KEY = "liveView";

/**
 * Options accepted by a live route statement.
 */
export interface LiveRouteOptions {
  /** Merged into the request session; opaque to the compiler */
  readonly session?: Readonly<Record<string, unknown>>;

  /** Layout override; defaults to the layout inferred from the router namespace */
  readonly layout?: LayoutSpec;

  /** Container element override; opaque to the compiler */
  readonly container?: ContainerSpec;

  /** Helper name override; skips helper name inference */
  readonly as?: string;
}

/**
 * A single live route statement, before compilation.
 */
export interface RouteDeclaration {
  readonly path: string;

  /** Dotted view reference, relative to the enclosing scope alias */
  readonly view: string;

  readonly action?: string;
  readonly options?: LiveRouteOptions;
}

/**
 * Per-route options after merging, as handed to the dispatch layer.
 */
export interface LiveRouteFullOptions {
  readonly session?: Readonly<Record<string, unknown>>;
  readonly container?: ContainerSpec;
  readonly as?: string;

  /** Namespace of the router that declared the route */
  readonly router: string;

  readonly action: string | null;

  /** Layout derived from the router namespace, kept even when overridden */
  readonly inferredLayout: LayoutSpec;

  /** Layout the route renders with */
  readonly layout: LayoutSpec;
}

export type LivePrivateMetadata = readonly [targetView: string, options: LiveRouteFullOptions];
export type LivePublicMetadata = readonly [targetView: string, action: string | null];

/**
 * Fully resolved live route. Frozen once built.
 */
export interface RouteDescriptor {
  /** Path as declared, before scope prefixes */
  readonly path: string;

  /** Action tag, or null for an action-less route */
  readonly action: string | null;

  readonly helperName: string;

  /** View reference qualified by the enclosing scope aliases */
  readonly targetView: string;

  readonly layout: LayoutSpec;
  readonly privateMetadata: LivePrivateMetadata;
  readonly publicMetadata: LivePublicMetadata;

  /** Live routes always bypass the host router's handler aliasing */
  readonly aliasSuppressed: true;
}

/**
 * The (action, options) pair passed to the host router's route primitive.
 */
export interface EmittedRoute {
  readonly action: string;
  readonly options: {
    readonly as: string;
    readonly private: { readonly [LIVE_VIEW_KEY]: LivePrivateMetadata };
    readonly alias: false;
    readonly metadata: { readonly [LIVE_VIEW_KEY]: LivePublicMetadata };
  };
}

/**
 * What the compiler needs from a host router.
 */
export interface HostRouter {
  readonly namespace: string;

  /** Qualify a reference against the current scope */
  scopedAlias(reference: string): string;

  /** Group-level options of the current scope */
  inheritedOptions(): GroupOptions;

  addRoute(
    verb: HttpVerb,
    path: string,
    handler: string,
    action: string,
    options: AddRouteOptions,
  ): RouteEntry;
}
