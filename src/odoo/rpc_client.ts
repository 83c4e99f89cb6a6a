/**
 * JSON-RPC client for the backend's `object.execute_kw` service.
 *
 * Contract: `call()` never throws. Transport failures, non-2xx responses,
 * undecodable bodies and backend-reported errors are logged and come back as
 * an empty row list, so callers treat "no data" and "call failed" alike.
 */
import { z } from "zod";
import { getLogger, type Logger } from "../util/logger";
import type { OdooConfig } from "./config";
import { RemoteRecord } from "./remote_record";

export type FetchFn = (
  input: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
  }
) => Promise<{
  ok: boolean;
  status: number;
  statusText?: string;
  json(): Promise<unknown>;
}>;

export type NamedArgs = Record<string, unknown>;

export interface RpcCaller {
  call(
    model: string,
    method: string,
    args: unknown[],
    kwargs?: NamedArgs
  ): Promise<RemoteRecord[]>;
}

export interface OdooRpcClientOptions {
  fetch?: FetchFn;
  logger?: Logger;
}

const ResponseEnvelope = z.object({
  result: z.unknown().optional(),
  error: z.unknown().optional(),
});

export interface RpcEnvelope {
  jsonrpc: "2.0";
  method: "call";
  params: {
    service: "object";
    method: "execute_kw";
    args: [string, number, string, string, string, unknown[], NamedArgs];
  };
}

export function buildEnvelope(
  config: Pick<OdooConfig, "db" | "uid" | "password">,
  model: string,
  method: string,
  args: unknown[],
  kwargs: NamedArgs = {}
): RpcEnvelope {
  return {
    jsonrpc: "2.0",
    method: "call",
    params: {
      service: "object",
      method: "execute_kw",
      args: [config.db, config.uid, config.password, model, method, args, kwargs],
    },
  };
}

export class OdooRpcClient implements RpcCaller {
  private readonly config: OdooConfig;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(config: OdooConfig, options: OdooRpcClientOptions = {}) {
    this.config = config;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? getLogger("odoo/rpc_client");
  }

  async call(
    model: string,
    method: string,
    args: unknown[],
    kwargs: NamedArgs = {}
  ): Promise<RemoteRecord[]> {
    const envelope = buildEnvelope(this.config, model, method, args, kwargs);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let payload: unknown;
    try {
      const res = await this.fetchFn(this.config.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(envelope),
        signal: controller.signal,
      });
      if (!res.ok) {
        this.logger.error(
          { model, method, status: res.status },
          `Request failed: ${res.status} ${res.statusText ?? ""}`.trim()
        );
        return [];
      }
      payload = await res.json();
    } catch (err) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.config.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      this.logger.error({ model, method }, `Request failed: ${reason}`);
      return [];
    } finally {
      clearTimeout(timer);
    }

    const parsed = ResponseEnvelope.safeParse(payload);
    if (!parsed.success) {
      this.logger.error({ model, method }, "Request failed: malformed response");
      return [];
    }

    if (parsed.data.error !== undefined) {
      this.logger.error(
        { model, method, error: parsed.data.error },
        "Odoo API error"
      );
      return [];
    }

    return toRecords(parsed.data.result);
  }
}

function toRecords(result: unknown): RemoteRecord[] {
  if (!Array.isArray(result)) return [];
  const rows: RemoteRecord[] = [];
  for (const item of result) {
    const row = RemoteRecord.fromUnknown(item);
    if (row) rows.push(row);
  }
  return rows;
}
