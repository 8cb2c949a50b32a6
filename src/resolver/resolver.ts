import type { AccessRoute } from "../schemas/index.js";
import {
  defaultRouteTable,
  identifyPublisher,
  MANUAL_ROUTE,
  type RouteTable,
} from "./publishers.js";

/**
 * Maps an identifier to its ordered candidate routes.
 * Pure: depends only on the identifier and the table given at construction.
 */
export class SourceResolver {
  private readonly table: RouteTable;

  constructor(table: RouteTable = defaultRouteTable()) {
    this.table = table;
  }

  /**
   * Never fails and never returns an empty list. Unknown publishers get
   * the "default" entry; every result ends with a manual route.
   */
  resolve(identifier: string): AccessRoute[] {
    const publisher = identifyPublisher(identifier);
    const configured =
      (publisher !== undefined ? this.table[publisher] : undefined) ??
      this.table.default ??
      [];

    const routes = configured.map((route) => ({ ...route }));
    const last = routes[routes.length - 1];
    if (last === undefined || last.kind !== "manual") {
      routes.push({ ...MANUAL_ROUTE });
    }
    return routes;
  }
}

/** Overlay configured entries on top of the built-in table */
export function mergeRouteTables(
  base: RouteTable,
  overrides: RouteTable | undefined,
): RouteTable {
  if (!overrides) return base;
  return { ...base, ...overrides };
}
