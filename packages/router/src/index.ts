export type {
  HttpVerb,
  LayoutSpec,
  ContainerSpec,
  Plug,
  GroupOptions,
  ScopeOptions,
  AddRouteOptions,
  RouteEntry,
  RouterOptions,
  ResolvedRouterOptions,
} from "./types.js";

export {
  RouterBuilder,
  defineRouter,
  plug,
  putLayout,
  normalizeRouterOptions,
  DEFAULT_ROUTER_OPTIONS,
} from "./builder.js";

export { RouteTable } from "./table.js";

export {
  assertRoutePath,
  buildPath,
  dynamicSegments,
  joinPath,
  pathSegments,
  type PathParam,
  type QueryParams,
} from "./paths.js";

export { formatRoutes } from "./format.js";

export {
  RouterError,
  RouterErrorCode,
  type RouterErrorCodeType,
} from "./errors.js";
