import { describe, expect, test } from "vitest";
import type { AccessRoute } from "../../schemas/index.js";
import {
  defaultRouteTable,
  identifyPublisher,
  MANUAL_ROUTE,
} from "../publishers.js";
import { mergeRouteTables, SourceResolver } from "../resolver.js";

function route(name: string, overrides: Partial<AccessRoute> = {}): AccessRoute {
  return {
    name,
    kind: "open-access",
    rate_limit_class: name,
    expected_format: "html",
    ...overrides,
  };
}

describe("identifyPublisher", () => {
  test("maps registrant prefixes", () => {
    expect(identifyPublisher("10.1016/j.actamat.2020.01.001")).toBe("elsevier");
    expect(identifyPublisher("10.1186/s12864-020-1")).toBe("springer");
    expect(identifyPublisher("10.1039/C9TA00001A")).toBe("rsc");
    expect(identifyPublisher("https://doi.org/10.1002/anie.2020")).toBe("wiley");
  });

  test("requires the full prefix segment", () => {
    expect(identifyPublisher("10.10161/whatever")).toBeUndefined();
  });

  test("unknown prefixes resolve to undefined", () => {
    expect(identifyPublisher("10.1021/acs.chemmater")).toBeUndefined();
    expect(identifyPublisher("not-a-doi")).toBeUndefined();
  });
});

describe("SourceResolver", () => {
  test("publisher routes come in table order", () => {
    const resolver = new SourceResolver();
    const routes = resolver.resolve("10.1016/j.x.2020");
    expect(routes.map((r) => r.name)).toEqual(["elsevier-api", "manual"]);
    expect(routes[0].expected_format).toBe("xml");
  });

  test("unknown publisher gets the default order ending in manual", () => {
    const resolver = new SourceResolver();
    const routes = resolver.resolve("10.9999/unknown");
    expect(routes.map((r) => r.name)).toEqual(["doi-resolver", "manual"]);
    expect(routes[routes.length - 1].kind).toBe("manual");
  });

  test("institutional proxy route appears when a prefix is configured", () => {
    const resolver = new SourceResolver(
      defaultRouteTable({ proxyPrefix: "https://proxy.example.edu/login?url=" }),
    );
    const routes = resolver.resolve("10.1007/s1");
    expect(routes.map((r) => r.kind)).toEqual([
      "open-access",
      "institutional-proxy",
      "manual",
    ]);
    expect(routes[1].url).toBe(
      "https://proxy.example.edu/login?url=https://doi.org/{identifier}",
    );
  });

  test("never returns an empty list", () => {
    const resolver = new SourceResolver({});
    expect(resolver.resolve("10.1016/x")).toEqual([MANUAL_ROUTE]);
  });

  test("appends the manual route when a configured list omits it", () => {
    const resolver = new SourceResolver({ default: [route("a"), route("b")] });
    expect(resolver.resolve("x").map((r) => r.name)).toEqual([
      "a",
      "b",
      "manual",
    ]);
  });

  test("is pure: callers cannot mutate the table through results", () => {
    const table = { default: [route("a")] };
    const resolver = new SourceResolver(table);
    const first = resolver.resolve("x");
    first[0].name = "changed";
    first.pop();

    expect(resolver.resolve("x").map((r) => r.name)).toEqual(["a", "manual"]);
    expect(table.default).toHaveLength(1);
  });
});

describe("mergeRouteTables", () => {
  test("overrides replace whole publisher entries", () => {
    const merged = mergeRouteTables(defaultRouteTable(), {
      rsc: [route("rsc-mirror")],
    });
    const resolver = new SourceResolver(merged);
    expect(resolver.resolve("10.1039/x").map((r) => r.name)).toEqual([
      "rsc-mirror",
      "manual",
    ]);
    expect(resolver.resolve("10.1016/x")[0].name).toBe("elsevier-api");
  });

  test("undefined overrides return the base table", () => {
    const base = defaultRouteTable();
    expect(mergeRouteTables(base, undefined)).toBe(base);
  });
});
