import type { AccessRoute } from "../schemas/index.js";

/**
 * What one attempt against one route produced. Transport failures are
 * values here; only the orchestrator decides whether to retry.
 */
export type Retrieval =
  | {
      kind: "artifact";
      bytes: Uint8Array;
      content_type?: string;
      declared_length?: number;
    }
  | { kind: "unavailable"; detail: string } // transient, retryable
  | { kind: "denied"; detail: string }
  | { kind: "not_found"; detail: string };

export interface RouteClient {
  retrieve(
    identifier: string,
    route: AccessRoute,
    signal: AbortSignal,
  ): Promise<Retrieval>;
}

/** Sends manual routes to the local client and everything else over HTTP */
export class RoutingClient implements RouteClient {
  constructor(
    private readonly http: RouteClient,
    private readonly manual: RouteClient,
  ) {}

  retrieve(
    identifier: string,
    route: AccessRoute,
    signal: AbortSignal,
  ): Promise<Retrieval> {
    const target = route.kind === "manual" ? this.manual : this.http;
    return target.retrieve(identifier, route, signal);
  }
}
