import { describe, test, expect } from "vitest";
import { RouterError, RouterErrorCode } from "../src/errors.js";
import { buildPath, dynamicSegments, joinPath } from "../src/paths.js";

describe("joinPath", () => {
  test("joins scope prefixes and route paths with single slashes", () => {
    expect(joinPath("/", "/")).toBe("/");
    expect(joinPath("/", "/thermo")).toBe("/thermo");
    expect(joinPath("/admin/", "users")).toBe("/admin/users");
    expect(joinPath("/api", "/v1/posts/:id")).toBe("/api/v1/posts/:id");
  });
});

describe("dynamicSegments", () => {
  test("lists named and glob segments in order", () => {
    expect(dynamicSegments("/articles/:id/comments/*rest")).toEqual(["id", "rest"]);
    expect(dynamicSegments("/static")).toEqual([]);
  });
});

describe("buildPath", () => {
  test("substitutes params positionally", () => {
    expect(buildPath("/articles/:id/edit", [12])).toBe("/articles/12/edit");
    expect(buildPath("/", [])).toBe("/");
  });

  test("encodes named params but keeps slashes of glob params", () => {
    expect(buildPath("/users/:name", ["a/b"])).toBe("/users/a%2Fb");
    expect(buildPath("/files/*path", ["a b/c"])).toBe("/files/a%20b/c");
  });

  test("appends a query string", () => {
    expect(buildPath("/search", [], { q: "live view", page: 2 })).toBe("/search?q=live+view&page=2");
    expect(buildPath("/search", [], {})).toBe("/search");
  });

  test("rejects a param count that does not match the pattern", () => {
    let caught: unknown;
    try {
      buildPath("/articles/:id", []);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RouterError);
    expect(caught).toMatchObject({
      code: RouterErrorCode.PARAM_MISMATCH,
      message: "path /articles/:id expects 1 param(s) (id), got 0",
    });
  });
});
