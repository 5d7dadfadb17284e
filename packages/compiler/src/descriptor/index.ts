export { buildRouteDescriptor, mergeLiveRouteOptions } from "./build.js";
export { validateAction, validateLiveRouteOptions, validateView } from "./validate.js";
