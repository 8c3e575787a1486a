/**
 * Gateway transport
 * Every collaborator (web research, market data, portfolio) sits behind one
 * request router that takes `{ target_service, payload }` and forwards it.
 * Each call carries its own timeout so a hung backend only costs that call.
 */

/** Service names the router's dispatch table accepts; anything else is a 400. */
export type TargetService = "tavily_research" | "alpha_vantage_market_data" | "internal_portfolio_data";

export interface Gateway {
  call(target: TargetService, payload: object, timeoutMs: number): Promise<unknown>;
}

export class GatewayError extends Error {
  constructor(
    readonly target: TargetService,
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

export class HttpGateway implements Gateway {
  constructor(private readonly url: string) {}

  async call(target: TargetService, payload: object, timeoutMs: number): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ target_service: target, payload }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error && err.name === "TimeoutError"
        ? `timed out after ${timeoutMs}ms`
        : err instanceof Error ? err.message : String(err);
      throw new GatewayError(target, `${target} unreachable: ${reason}`);
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new GatewayError(target, `${target} → ${res.status} ${text.slice(0, 200)}`.trim(), res.status);
    }

    try {
      const body: unknown = await res.json();
      return body;
    } catch {
      throw new GatewayError(target, `${target} returned a non-JSON body`, res.status);
    }
  }
}
