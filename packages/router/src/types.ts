/* =============================================================================
 * SHARED SHAPES
 * ============================================================================= */

export type HttpVerb = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS" | "HEAD";

/**
 * Layout rendered around a view: the layout view reference and its template.
 */
export type LayoutSpec = readonly [view: string, template: string];

/**
 * Container element for a view: tag name and DOM attributes.
 */
export type ContainerSpec = readonly [tag: string, attributes: Readonly<Record<string, string>>];

/**
 * A step of a pipeline.
 *
 * Plugs are opaque to the router except `put-layout`, which contributes a
 * group-level layout to every route piped through it.
 */
export type Plug =
  | { readonly kind: "plug"; readonly name: string; readonly options?: Readonly<Record<string, unknown>> }
  | { readonly kind: "put-layout"; readonly layout: LayoutSpec };

/* =============================================================================
 * SCOPES
 * ============================================================================= */

/**
 * Group-level options shared by every route declared inside a scope.
 */
export interface GroupOptions {
  readonly layout?: LayoutSpec;
  readonly session?: Readonly<Record<string, unknown>>;
  readonly container?: ContainerSpec;
}

export interface ScopeOptions extends GroupOptions {
  /** Namespace prepended to handler and view references */
  readonly alias?: string;

  /** Prefix for helper names of routes in this scope */
  readonly as?: string;
}

/* =============================================================================
 * ROUTES
 * ============================================================================= */

/**
 * Options accepted by the generic route primitive.
 */
export interface AddRouteOptions {
  /** Helper name; inferred from the handler when absent */
  readonly as?: string;

  /** Set to false to keep the handler out of scope aliasing */
  readonly alias?: boolean;

  /** Data handed to the dispatch layer, keyed by owner */
  readonly private?: Readonly<Record<string, unknown>>;

  /** Data exposed for introspection, keyed by owner */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * A registered route, as stored in the route table.
 */
export interface RouteEntry {
  readonly verb: HttpVerb;

  /** Full path including scope prefixes */
  readonly path: string;

  /** Handler identifier, qualified unless aliasing was suppressed */
  readonly handler: string;

  readonly action: string;

  /** Helper name including scope prefixes */
  readonly helper: string;

  /** Pipelines the route is piped through, outermost first */
  readonly pipeThrough: readonly string[];

  readonly private: Readonly<Record<string, unknown>>;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/* =============================================================================
 * ROUTER OPTIONS
 * ============================================================================= */

export interface RouterOptions {
  /**
   * Suffix stripped from the last handler segment when inferring helper names.
   * @default "Controller"
   */
  handlerSuffix?: string;
}

export type ResolvedRouterOptions = Required<RouterOptions>;
