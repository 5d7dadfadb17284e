import {
  normalizeLiveRouteConfig,
  type LiveRouteCompilerConfig,
  type ResolvedLiveRouteCompilerConfig,
} from "./config.js";
import { buildRouteDescriptor } from "./descriptor/index.js";
import { emitRoute } from "./emit/index.js";
import type { HostRouter, LiveRouteOptions, RouteDeclaration, RouteDescriptor } from "./model/route.js";

/**
 * Compiles live route statements against a host router.
 */
export interface LiveRouteCompiler {
  readonly config: ResolvedLiveRouteCompilerConfig;

  /** Build the descriptor of a declaration without registering it */
  compile(router: HostRouter, declaration: RouteDeclaration): RouteDescriptor;

  /**
   * Declare a live route: compile it and register it with the router.
   *
   * ```ts
   * live(router, "/thermostat", "ThermostatLive");
   * live(router, "/articles/:id/edit", "ArticleLive.Index", "edit");
   * live(router, "/clock", "ClockLive", { container: ["span", {}] });
   * ```
   */
  live(
    router: HostRouter,
    path: string,
    view: string,
    actionOrOptions?: string | LiveRouteOptions,
    options?: LiveRouteOptions,
  ): RouteDescriptor;
}

/**
 * Turn the positional statement arguments into a declaration. An options bag
 * in the action position means no action; it is merged under the trailing bag.
 */
export function toRouteDeclaration(
  path: string,
  view: string,
  actionOrOptions?: string | LiveRouteOptions,
  options?: LiveRouteOptions,
): RouteDeclaration {
  if (actionOrOptions === undefined || typeof actionOrOptions === "string") {
    return {
      path,
      view,
      ...(actionOrOptions !== undefined ? { action: actionOrOptions } : {}),
      ...(options ? { options } : {}),
    };
  }
  return { path, view, options: { ...actionOrOptions, ...options } };
}

export function createLiveRouteCompiler(config?: LiveRouteCompilerConfig): LiveRouteCompiler {
  const resolved = normalizeLiveRouteConfig(config);

  const compile = (router: HostRouter, declaration: RouteDeclaration): RouteDescriptor =>
    buildRouteDescriptor(router, declaration, resolved);

  return {
    config: resolved,
    compile,
    live(router, path, view, actionOrOptions, options) {
      const descriptor = compile(router, toRouteDeclaration(path, view, actionOrOptions, options));
      const emitted = emitRoute(descriptor);
      router.addRoute("GET", path, resolved.handler, emitted.action, emitted.options);
      return descriptor;
    },
  };
}

const defaultCompiler = createLiveRouteCompiler();

/**
 * Declare a live route with the default conventions.
 */
export function live(
  router: HostRouter,
  path: string,
  view: string,
  actionOrOptions?: string | LiveRouteOptions,
  options?: LiveRouteOptions,
): RouteDescriptor {
  return defaultCompiler.live(router, path, view, actionOrOptions, options);
}
