import type { AccessRoute } from "../schemas/index.js";
import { normalizeIdentifier } from "../queue/normalize.js";

export type Publisher = "elsevier" | "springer" | "rsc" | "wiley";

/** DOI registrant prefix → publisher */
export const PUBLISHER_PREFIXES: Readonly<Record<Publisher, readonly string[]>> =
  {
    elsevier: ["10.1016", "10.1006", "10.1205"],
    springer: ["10.1007", "10.1140", "10.1891", "10.1617", "10.1023", "10.1186"],
    rsc: ["10.1039"],
    wiley: ["10.1002", "10.1111"],
  };

/** Display names recorded in document metadata */
export const PUBLISHER_NAMES: Readonly<Record<Publisher, string>> = {
  elsevier: "Elsevier",
  springer: "Springer",
  rsc: "Royal Society of Chemistry",
  wiley: "Wiley",
};

export function identifyPublisher(identifier: string): Publisher | undefined {
  const key = normalizeIdentifier(identifier);
  for (const [publisher, prefixes] of Object.entries(PUBLISHER_PREFIXES)) {
    if (prefixes.some((prefix) => key.startsWith(`${prefix}/`))) {
      return toPublisher(publisher);
    }
  }
  return undefined;
}

function toPublisher(name: string): Publisher | undefined {
  switch (name) {
    case "elsevier":
    case "springer":
    case "rsc":
    case "wiley":
      return name;
    default:
      return undefined;
  }
}

/** Publisher name (or "default") → ordered routes, cheapest first */
export type RouteTable = Record<string, AccessRoute[]>;

export const MANUAL_ROUTE: Readonly<AccessRoute> = {
  name: "manual",
  kind: "manual",
  rate_limit_class: "local",
  expected_format: "html",
};

const HTML_ACCEPT = "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8";

export interface RouteTableOpts {
  /** Institutional proxy prefix, e.g. "https://proxy.example.edu/login?url=" */
  proxyPrefix?: string;
}

/**
 * Built-in route table. Every publisher list ends in the manual route;
 * the institutional proxy route is only present when a prefix is set.
 */
export function defaultRouteTable(opts: RouteTableOpts = {}): RouteTable {
  const proxy: AccessRoute[] = opts.proxyPrefix
    ? [
        {
          name: "institutional-proxy",
          kind: "institutional-proxy",
          rate_limit_class: "proxy",
          expected_format: "html",
          url: `${opts.proxyPrefix}https://doi.org/{identifier}`,
          headers: { Accept: HTML_ACCEPT },
        },
      ]
    : [];

  return {
    elsevier: [
      {
        name: "elsevier-api",
        kind: "publisher-api",
        rate_limit_class: "elsevier",
        expected_format: "xml",
        url: "https://api.elsevier.com/content/article/doi/{identifier}?view=FULL",
        headers: {
          Accept: "text/xml",
          "X-ELS-APIKey": "{credential:elsevier}",
        },
      },
      ...proxy,
      { ...MANUAL_ROUTE },
    ],
    springer: [
      {
        name: "springer-link",
        kind: "open-access",
        rate_limit_class: "springer",
        expected_format: "html",
        url: "https://link.springer.com/{identifier}.html",
        headers: { Accept: HTML_ACCEPT },
      },
      ...proxy,
      { ...MANUAL_ROUTE },
    ],
    rsc: [
      {
        name: "rsc-doi",
        kind: "open-access",
        rate_limit_class: "rsc",
        expected_format: "html",
        url: "https://doi.org/{identifier}",
        headers: { Accept: HTML_ACCEPT },
      },
      ...proxy,
      { ...MANUAL_ROUTE },
    ],
    wiley: [
      {
        name: "wiley-tdm",
        kind: "publisher-api",
        rate_limit_class: "wiley",
        expected_format: "pdf",
        url: "https://api.wiley.com/onlinelibrary/tdm/v1/articles/{identifier_encoded}",
        headers: { "Wiley-TDM-Client-Token": "{credential:wiley}" },
      },
      ...proxy,
      { ...MANUAL_ROUTE, expected_format: "pdf" },
    ],
    default: [
      {
        name: "doi-resolver",
        kind: "open-access",
        rate_limit_class: "doi",
        expected_format: "html",
        url: "https://doi.org/{identifier}",
        headers: { Accept: HTML_ACCEPT },
      },
      ...proxy,
      { ...MANUAL_ROUTE },
    ],
  };
}
