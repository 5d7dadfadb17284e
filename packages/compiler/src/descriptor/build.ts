import type { GroupOptions, LayoutSpec } from "@liveroute/router";
import { debug } from "@liveroute/shared";
import { DEFAULT_LIVE_ROUTE_CONFIG, type ResolvedLiveRouteCompilerConfig } from "../config.js";
import { inferHelperName, inferLayout } from "../inference/index.js";
import type {
  HostRouter,
  LiveRouteFullOptions,
  LiveRouteOptions,
  RouteDeclaration,
  RouteDescriptor,
} from "../model/route.js";
import { validateAction, validateLiveRouteOptions, validateView } from "./validate.js";

/**
 * Merge route options over the group options of the enclosing scopes.
 * Route keys win; session maps are merged key by key.
 */
export function mergeLiveRouteOptions(
  inherited: GroupOptions,
  options: LiveRouteOptions,
): LiveRouteOptions {
  const session = inherited.session || options.session
    ? Object.freeze({ ...inherited.session, ...options.session })
    : undefined;
  const layout = options.layout ?? inherited.layout;
  const container = options.container ?? inherited.container;

  return {
    ...(session ? { session } : {}),
    ...(layout ? { layout: freezePair(layout) } : {}),
    ...(container ? { container: Object.freeze([container[0], Object.freeze({ ...container[1] })] as const) } : {}),
    ...(options.as !== undefined ? { as: options.as } : {}),
  };
}

function freezePair(layout: LayoutSpec): LayoutSpec {
  return Object.freeze([layout[0], layout[1]] as const);
}

/**
 * Compile a live route declaration into its frozen descriptor.
 *
 * The view is qualified through the host router's scope aliases, the helper
 * name comes from `as` or from inference, and the layout falls back to the
 * one inferred from the router namespace.
 */
export function buildRouteDescriptor(
  router: HostRouter,
  declaration: RouteDeclaration,
  config: ResolvedLiveRouteCompilerConfig = DEFAULT_LIVE_ROUTE_CONFIG,
): RouteDescriptor {
  const declared = declaration.options ?? {};
  validateView(declaration.view);
  validateLiveRouteOptions(declared, declaration.view);
  const action = declaration.action ?? null;
  if (action !== null) validateAction(action, declaration.view);

  const targetView = router.scopedAlias(declaration.view);
  const helperName = declared.as ?? inferHelperName(targetView, action, config).helperName;
  const inferredLayout = inferLayout(router.namespace, config);

  const merged = mergeLiveRouteOptions(router.inheritedOptions(), declared);
  const layout = merged.layout ?? inferredLayout;

  const fullOptions: LiveRouteFullOptions = {
    ...merged,
    router: router.namespace,
    action,
    inferredLayout,
    layout,
  };
  Object.freeze(fullOptions);

  const descriptor: RouteDescriptor = {
    path: declaration.path,
    action,
    helperName,
    targetView,
    layout,
    privateMetadata: Object.freeze([targetView, fullOptions] as const),
    publicMetadata: Object.freeze([targetView, action] as const),
    aliasSuppressed: true,
  };
  Object.freeze(descriptor);

  debug.live("descriptor.built", {
    path: descriptor.path,
    view: targetView,
    action,
    helperName,
    layout: layout[0],
  });
  return descriptor;
}
