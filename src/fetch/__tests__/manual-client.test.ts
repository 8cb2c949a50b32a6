import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { MANUAL_ROUTE } from "../../resolver/index.js";
import { ManualRouteClient } from "../manual-client.js";
import { RoutingClient } from "../route-client.js";
import type { Retrieval, RouteClient } from "../route-client.js";

const signal = new AbortController().signal;

describe("ManualRouteClient", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "manual-route-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("reads <safe identifier>.<ext> from the directory", async () => {
    await writeFile(path.join(dir, "101039c9ta00001a.html"), "<html></html>");
    const client = new ManualRouteClient(dir);

    const result = await client.retrieve("10.1039/C9TA00001A", MANUAL_ROUTE);

    expect(result).toEqual({
      kind: "artifact",
      bytes: Buffer.from("<html></html>"),
    });
  });

  test("finds files saved under the identifier's original letter case", async () => {
    await writeFile(path.join(dir, "101039C9TA00001A.html"), "<html></html>");
    const client = new ManualRouteClient(dir);

    for (const identifier of ["10.1039/C9TA00001A", "10.1039/c9ta00001a"]) {
      expect(await client.retrieve(identifier, MANUAL_ROUTE)).toEqual({
        kind: "artifact",
        bytes: Buffer.from("<html></html>"),
      });
    }
  });

  test("a missing directory is not found", async () => {
    const client = new ManualRouteClient(path.join(dir, "absent"));
    const result = await client.retrieve("10.1/x", MANUAL_ROUTE);
    expect(result.kind).toBe("not_found");
  });

  test("prefers the route's expected format", async () => {
    await writeFile(path.join(dir, "101002x.html"), "<html></html>");
    await writeFile(path.join(dir, "101002x.pdf"), "%PDF-1.4");
    const client = new ManualRouteClient(dir);

    const result = await client.retrieve("10.1002/x", {
      ...MANUAL_ROUTE,
      expected_format: "pdf",
    });

    expect(result).toEqual({ kind: "artifact", bytes: Buffer.from("%PDF-1.4") });
  });

  test("absent file is not found", async () => {
    const client = new ManualRouteClient(dir);
    const result = await client.retrieve("10.1/missing", MANUAL_ROUTE);
    expect(result.kind).toBe("not_found");
  });

  test("no directory configured is not found", async () => {
    const client = new ManualRouteClient();
    const result = await client.retrieve("10.1/missing", MANUAL_ROUTE);
    expect(result).toEqual({
      kind: "not_found",
      detail: "no manual directory configured",
    });
  });
});

describe("RoutingClient", () => {
  test("dispatches manual routes locally and the rest over HTTP", async () => {
    const calls: string[] = [];
    const fake = (label: string): RouteClient => ({
      async retrieve(): Promise<Retrieval> {
        calls.push(label);
        return { kind: "not_found", detail: label };
      },
    });
    const routing = new RoutingClient(fake("http"), fake("manual"));

    await routing.retrieve("10.1/x", MANUAL_ROUTE, signal);
    await routing.retrieve(
      "10.1/x",
      {
        name: "doi-resolver",
        kind: "open-access",
        rate_limit_class: "doi.org",
        expected_format: "html",
        url: "https://doi.org/{identifier}",
      },
      signal,
    );

    expect(calls).toEqual(["manual", "http"]);
  });
});
