import { LIVE_VIEW_KEY, type EmittedRoute, type RouteDescriptor } from "../model/route.js";

/**
 * Convert a descriptor into the (action, options) pair taken by the host
 * router's route primitive.
 *
 * Action-less routes register the target view as their action, so the
 * implied helper builds paths by view: `table.path("live", "MyApp.ClockLive")`.
 */
export function emitRoute(descriptor: RouteDescriptor): EmittedRoute {
  return {
    action: descriptor.action ?? descriptor.targetView,
    options: {
      as: descriptor.helperName,
      private: { [LIVE_VIEW_KEY]: descriptor.privateMetadata },
      alias: false,
      metadata: { [LIVE_VIEW_KEY]: descriptor.publicMetadata },
    },
  };
}
