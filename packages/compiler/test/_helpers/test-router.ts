/**
 * Router definition shared by the integration tests: a browser pipeline, a
 * pipeline that forces an unknown layout, and every shape of live route.
 */
import { defineRouter, plug, putLayout, type RouteTable } from "@liveroute/router";
import { live } from "../../src/index.js";

export const TEST_ROUTER = "LiveTest.Router";

export function defineTestRouter(): RouteTable {
  return defineRouter(TEST_ROUTER, (r) => {
    r.pipeline("browser", [
      plug("accepts", { formats: ["html"] }),
      plug("session", { store: "cookie", key: "_live_key", signingSalt: "test-salt" }),
      plug("fetchSession"),
      plug("flash"),
    ]);

    r.pipeline("badLayout", [putLayout("UnknownView", "unknown_template")]);

    r.scope("/", "LiveTest", (r) => {
      r.pipeThrough("browser");

      r.get("/controller/:type", "Controller", "incoming");

      live(r, "/router/thermo_defaults/:id", "DashboardLive");
      live(r, "/router/thermo_container/:id", "DashboardLive", { container: ["span", { style: "flex-grow" }] });
      live(r, "/router/thermo_session/custom/:id", "DashboardLive", { as: "custom_live" });
      live(r, "/router/foobarbaz", "FooBarLive", "index");
      live(r, "/router/foobarbaz/index", "FooBarLive.Index", "index");
      live(r, "/router/foobarbaz/show", "FooBarLive.Index", "show");
      live(r, "/router/foobarbaz/nested/index", "FooBarLive.Nested.Index", "index");
      live(r, "/router/foobarbaz/nested/show", "FooBarLive.Nested.Index", "show");
      live(r, "/router/foobarbaz/custom", "FooBarLive", "index", { as: "custom_foo_bar" });

      live(r, "/thermo", "ThermostatLive");
      live(r, "/thermo/:id", "ThermostatLive");
      live(r, "/", "ThermostatLive", { as: "live_root" });

      r.scope("/", {}, (r) => {
        r.pipeThrough("badLayout");

        // The route layout option takes precedence over the pipeline layout
        live(r, "/bad_layout", "LayoutLive");
        live(r, "/layout", "LayoutLive", { layout: ["LiveTest.LayoutView", "app"] });
      });

      live(r, "/action", "ActionLive");
      live(r, "/action/index", "ActionLive", "index");
      live(r, "/action/:id/edit", "ActionLive", "edit");
    });
  });
}
