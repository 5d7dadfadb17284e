import { describe, test, expect } from "vitest";
import { RouterErrorCode, defineRouter, formatRoutes } from "../src/index.js";

function sampleTable() {
  return defineRouter("MyAppWeb.Router", (r) => {
    r.scope("/", "MyAppWeb", (r) => {
      r.get("/", "PageController", "index");
      r.get("/articles/:id", "ArticleController", "show", {
        private: { owner: { tag: "article" } },
        metadata: { owner: "articles" },
      });
      r.get("/articles/:id/edit", "ArticleController", "edit");
    });
  });
}

describe("RouteTable", () => {
  test("finds routes by helper and action", () => {
    const table = sampleTable();
    expect(table.findByHelper("article", "edit")?.path).toBe("/articles/:id/edit");
    expect(table.findByHelper("article", "delete")).toBeUndefined();
  });

  test("builds paths from helpers", () => {
    const table = sampleTable();
    expect(table.path("page", "index")).toBe("/");
    expect(table.path("article", "show", [42])).toBe("/articles/42");
    expect(table.path("article", "edit", ["a b"], { tab: "meta" })).toBe("/articles/a%20b/edit?tab=meta");
  });

  test("reports unknown helpers and actions", () => {
    const table = sampleTable();
    expect(() => table.path("author", "show")).toThrow("no helper named author in MyAppWeb.Router");
    expect(() => table.path("article", "delete")).toThrow("no route for helper article with action delete");
    try {
      table.path("author", "show");
    } catch (error) {
      expect(error).toMatchObject({ code: RouterErrorCode.UNKNOWN_HELPER });
    }
  });

  test("exposes private data and metadata by owner key", () => {
    const table = sampleTable();
    const route = table.routes[1];
    expect(route).toBeDefined();
    if (!route) return;
    expect(table.privateFor(route, "owner")).toEqual({ tag: "article" });
    expect(table.metadataFor(route, "owner")).toBe("articles");
    expect(table.privateFor(route, "missing")).toBeUndefined();
  });

  test("is frozen", () => {
    const table = sampleTable();
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.routes)).toBe(true);
  });
});

describe("formatRoutes", () => {
  test("aligns helper, verb, path and handler columns", () => {
    const table = defineRouter("MyAppWeb.Router", (r) => {
      r.get("/", "PageController", "index");
      r.post("/articles", "ArticleController", "create");
    });

    expect(formatRoutes(table).split("\n")).toEqual([
      "   page_path  GET   /          PageController     index",
      "article_path  POST  /articles  ArticleController  create",
    ]);
  });

  test("renders an empty table as an empty string", () => {
    expect(formatRoutes(defineRouter("MyAppWeb.Router", () => {}))).toBe("");
  });
});
