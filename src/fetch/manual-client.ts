import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { safeIdentifier } from "../queue/index.js";
import type { AccessRoute, ArtifactFormat } from "../schemas/index.js";
import type { Retrieval, RouteClient } from "./route-client.js";

const EXTENSIONS: readonly ArtifactFormat[] = ["html", "xml", "pdf"];

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}

/**
 * Reads artifacts someone downloaded by hand into `directory`, named
 * `<safe identifier>.<html|xml|pdf>`. Names match regardless of case, so
 * "101039C9TA00001A.html" is found for "10.1039/c9ta00001a".
 */
export class ManualRouteClient implements RouteClient {
  constructor(private readonly directory?: string) {}

  async retrieve(identifier: string, route: AccessRoute): Promise<Retrieval> {
    if (!this.directory) {
      return { kind: "not_found", detail: "no manual directory configured" };
    }
    const base = safeIdentifier(identifier);
    const order = [
      route.expected_format,
      ...EXTENSIONS.filter((ext) => ext !== route.expected_format),
    ];
    const names = await this.listDirectory();
    for (const ext of order) {
      const wanted = `${base}.${ext}`;
      const name = names.includes(wanted)
        ? wanted
        : names.find((n) => n.toLowerCase() === wanted.toLowerCase());
      if (name === undefined) continue;
      const bytes = await readFile(path.join(this.directory, name));
      return { kind: "artifact", bytes };
    }
    return {
      kind: "not_found",
      detail: `no ${base}.{${order.join(",")}} in ${this.directory}`,
    };
  }

  private async listDirectory(): Promise<string[]> {
    if (!this.directory) return [];
    try {
      return await readdir(this.directory);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
  }
}
