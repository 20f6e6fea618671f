/**
 * JSON-RPC 2.0 transport.
 *
 * `HttpJsonRpcTransport` posts one request per call with the global `fetch`. Every request
 * carries its own `AbortSignal.timeout`, which also bounds how long a tracker probe can hang.
 */

import { z } from "zod";
import { RpcError } from "../errors";

export interface JsonRpcTransport {
  /** Resolve to the raw `result` (null when the node returned none). */
  request(method: string, params: readonly unknown[]): Promise<unknown>;
}

export interface HttpTransportOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

const rpcResponseSchema = z.object({
  jsonrpc: z.literal("2.0"),
  id: z.union([z.number(), z.string(), z.null()]),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    })
    .optional(),
});

/** JSON.stringify replacer: bigints travel as decimal strings. */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class HttpJsonRpcTransport implements JsonRpcTransport {
  private requestId = 0;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(
    public readonly rpcUrl: string,
    options: HttpTransportOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.headers = { "Content-Type": "application/json", ...options.headers };
  }

  async request(method: string, params: readonly unknown[]): Promise<unknown> {
    const body = { jsonrpc: "2.0", method, params, id: ++this.requestId };

    let response: Response;
    try {
      response = await fetch(this.rpcUrl, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(body, jsonReplacer),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new RpcError(`Request ${method} failed: ${describe(error)}`, method);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new RpcError(`HTTP ${response.status}: ${errorText}`, method, undefined, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new RpcError(`Invalid JSON from ${method}: ${describe(error)}`, method, undefined, response.status);
    }

    const parsed = rpcResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new RpcError(`Malformed JSON-RPC response for ${method}`, method, undefined, response.status);
    }
    if (parsed.data.error) {
      const { code, message } = parsed.data.error;
      throw new RpcError(`RPC Error: ${message} (code: ${code})`, method, code);
    }
    return parsed.data.result ?? null;
  }
}
