import { RouterError, RouterErrorCode } from "./errors.js";
import { buildPath, type PathParam, type QueryParams } from "./paths.js";
import type { RouteEntry } from "./types.js";

/**
 * Immutable table of routes, in declaration order.
 *
 * Produced once by `RouterBuilder.build()` and read by the dispatch layer.
 */
export class RouteTable {
  readonly routes: readonly RouteEntry[];

  constructor(
    readonly namespace: string,
    routes: readonly RouteEntry[],
  ) {
    this.routes = Object.freeze([...routes]);
    Object.freeze(this);
  }

  /**
   * First route registered under a helper name and action.
   */
  findByHelper(helper: string, action: string): RouteEntry | undefined {
    return this.routes.find((r) => r.helper === helper && r.action === action);
  }

  /**
   * Build a path from a helper name and action.
   *
   * @example
   * table.path("article_index", "edit", [123]) // "/articles/123/edit"
   */
  path(helper: string, action: string, params: readonly PathParam[] = [], query?: QueryParams): string {
    const route = this.findByHelper(helper, action);
    if (!route) {
      const known = this.routes.some((r) => r.helper === helper);
      throw new RouterError(
        known
          ? `no route for helper ${helper} with action ${action}`
          : `no helper named ${helper} in ${this.namespace}`,
        RouterErrorCode.UNKNOWN_HELPER,
      );
    }
    return buildPath(route.path, params, query);
  }

  /**
   * Dispatch-time data stored on a route under an owner key.
   */
  privateFor(route: RouteEntry, key: string): unknown {
    return route.private[key];
  }

  /**
   * Introspection data stored on a route under an owner key.
   */
  metadataFor(route: RouteEntry, key: string): unknown {
    return route.metadata[key];
  }
}
