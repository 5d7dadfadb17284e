export { emitRoute } from "./emit.js";
export { liveRouteOf, liveMetadataOf, type LiveRouteInfo } from "./read.js";
