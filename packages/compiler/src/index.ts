// Live route compiler
//
// Compiles declarative live route statements into frozen route descriptors
// and registers them with a host router.

export type {
  LiveRouteOptions,
  RouteDeclaration,
  LiveRouteFullOptions,
  LivePrivateMetadata,
  LivePublicMetadata,
  RouteDescriptor,
  EmittedRoute,
  HostRouter,
} from "./model/route.js";
export { LIVE_VIEW_KEY } from "./model/route.js";

export {
  LiveRouteError,
  LiveRouteErrorCode,
  type LiveRouteErrorCodeType,
} from "./model/errors.js";

export {
  DEFAULT_LIVE_ROUTE_CONFIG,
  normalizeLiveRouteConfig,
  type LiveRouteCompilerConfig,
  type ResolvedLiveRouteCompilerConfig,
} from "./config.js";

export { inferHelperName, inferLayout, type InferredHelper } from "./inference/index.js";

export {
  buildRouteDescriptor,
  mergeLiveRouteOptions,
  validateAction,
  validateLiveRouteOptions,
  validateView,
} from "./descriptor/index.js";

export { emitRoute, liveRouteOf, liveMetadataOf, type LiveRouteInfo } from "./emit/index.js";

export {
  createLiveRouteCompiler,
  live,
  toRouteDeclaration,
  type LiveRouteCompiler,
} from "./live.js";
