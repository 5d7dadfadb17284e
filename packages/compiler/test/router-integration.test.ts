import { describe, test, expect } from "vitest";
import { RouterError, RouterErrorCode, type RouteEntry } from "@liveroute/router";
import { LIVE_VIEW_KEY, liveMetadataOf, liveRouteOf } from "../src/index.js";
import { TEST_ROUTER, defineTestRouter } from "./_helpers/test-router.js";

const table = defineTestRouter();

function routeAt(path: string): RouteEntry {
  const route = table.routes.find((r) => r.path === path);
  if (!route) throw new Error(`no route at ${path}`);
  return route;
}

describe("live routes in a router definition", () => {
  test("registers helpers and actions in declaration order", () => {
    expect(table.routes.map((r) => [r.helper, r.action, r.path])).toEqual([
      ["controller", "incoming", "/controller/:type"],
      ["live", "LiveTest.DashboardLive", "/router/thermo_defaults/:id"],
      ["live", "LiveTest.DashboardLive", "/router/thermo_container/:id"],
      ["custom_live", "LiveTest.DashboardLive", "/router/thermo_session/custom/:id"],
      ["foo_bar", "index", "/router/foobarbaz"],
      ["foo_bar_index", "index", "/router/foobarbaz/index"],
      ["foo_bar_index", "show", "/router/foobarbaz/show"],
      ["foo_bar_nested_index", "index", "/router/foobarbaz/nested/index"],
      ["foo_bar_nested_index", "show", "/router/foobarbaz/nested/show"],
      ["custom_foo_bar", "index", "/router/foobarbaz/custom"],
      ["live", "LiveTest.ThermostatLive", "/thermo"],
      ["live", "LiveTest.ThermostatLive", "/thermo/:id"],
      ["live_root", "LiveTest.ThermostatLive", "/"],
      ["live", "LiveTest.LayoutLive", "/bad_layout"],
      ["live", "LiveTest.LayoutLive", "/layout"],
      ["live", "LiveTest.ActionLive", "/action"],
      ["action", "index", "/action/index"],
      ["action", "edit", "/action/:id/edit"],
    ]);
  });

  test("live routes are GET routes on the live handler, outside scope aliasing", () => {
    const live = table.routes.filter((r) => liveRouteOf(r) !== undefined);
    expect(live).toHaveLength(17);
    for (const route of live) {
      expect(route.verb).toBe("GET");
      expect(route.handler).toBe("LiveView.Plug");
    }
    expect(routeAt("/controller/:type").handler).toBe("LiveTest.Controller");
  });

  test("stores the full options for the dispatch layer", () => {
    expect(liveRouteOf(routeAt("/router/thermo_container/:id"))).toEqual({
      view: "LiveTest.DashboardLive",
      options: {
        container: ["span", { style: "flex-grow" }],
        router: TEST_ROUTER,
        action: null,
        inferredLayout: ["LiveTest.LayoutView", "app"],
        layout: ["LiveTest.LayoutView", "app"],
      },
    });
    expect(table.privateFor(routeAt("/action/:id/edit"), LIVE_VIEW_KEY)).toEqual([
      "LiveTest.ActionLive",
      {
        router: TEST_ROUTER,
        action: "edit",
        inferredLayout: ["LiveTest.LayoutView", "app"],
        layout: ["LiveTest.LayoutView", "app"],
      },
    ]);
  });

  test("exposes the view and action as metadata", () => {
    expect(liveMetadataOf(routeAt("/router/foobarbaz/nested/show"))).toEqual([
      "LiveTest.FooBarLive.Nested.Index",
      "show",
    ]);
    expect(table.metadataFor(routeAt("/thermo"), LIVE_VIEW_KEY)).toEqual(["LiveTest.ThermostatLive", null]);
    expect(liveMetadataOf(routeAt("/controller/:type"))).toBeUndefined();
  });

  test("pipeline layouts apply unless the route sets its own", () => {
    expect(liveRouteOf(routeAt("/bad_layout"))?.options.layout).toEqual(["UnknownView", "unknown_template"]);
    expect(liveRouteOf(routeAt("/layout"))?.options.layout).toEqual(["LiveTest.LayoutView", "app"]);
    expect(liveRouteOf(routeAt("/bad_layout"))?.options.inferredLayout).toEqual(["LiveTest.LayoutView", "app"]);
  });

  test("routes keep the pipelines of their scopes", () => {
    expect(routeAt("/thermo").pipeThrough).toEqual(["browser"]);
    expect(routeAt("/bad_layout").pipeThrough).toEqual(["browser", "badLayout"]);
  });
});

describe("path helpers for live routes", () => {
  test("build paths by helper and action", () => {
    expect(table.path("action", "edit", [123])).toBe("/action/123/edit");
    expect(table.path("action", "index")).toBe("/action/index");
    expect(table.path("foo_bar_nested_index", "show")).toBe("/router/foobarbaz/nested/show");
  });

  test("action-less routes are addressed by their view", () => {
    expect(table.path("live", "LiveTest.ThermostatLive")).toBe("/thermo");
    expect(table.path("live_root", "LiveTest.ThermostatLive")).toBe("/");
    expect(table.path("live", "LiveTest.ActionLive", [], { tab: "all" })).toBe("/action?tab=all");
  });

  test("unknown helpers fail", () => {
    let error: unknown;
    try {
      table.path("thermostat", "show");
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(RouterError);
    expect(error).toMatchObject({
      code: RouterErrorCode.UNKNOWN_HELPER,
      message: "no helper named thermostat in LiveTest.Router",
    });
  });
});
