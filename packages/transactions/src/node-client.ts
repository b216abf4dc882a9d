/**
 * @tanglekit/transactions — Node client.
 *
 * NetworkClient is everything the engine needs from a node. HttpNodeClient
 * implements it over the node REST API with native fetch().
 *
 * Error mapping:
 * - Transport failure or 5xx → NetworkError (timedOut when the request timer fired)
 * - Other 4xx → WalletError REJECTED
 * - 404 on block metadata → status notFound
 * - Response body that fails validation → NetworkError
 */

import { z } from "zod";
import { NOOP_LOGGER, NetworkError, UNLOCK_TYPE, WalletError } from "@tanglekit/types";
import type {
  InclusionStatus,
  Logger,
  OutputWithId,
  ProtocolParameters,
  SignedTransaction,
  SubmissionHandle,
  TransactionPayload,
  Unlock,
} from "@tanglekit/types";
import { outputFromJson, outputToJson } from "@tanglekit/outputs";
import type { OutputJson } from "@tanglekit/outputs";
import { buildOutputId } from "./essence.js";

export interface NetworkClient {
  submitTransaction(signed: SignedTransaction): Promise<SubmissionHandle>;
  /** `signal` abandons the request; the client rejects once it fires. */
  getStatus(handle: SubmissionHandle, signal?: AbortSignal): Promise<InclusionStatus>;
  /** Unspent basic outputs held by a bech32 address. */
  fetchUnspentOutputs(bech32Address: string): Promise<OutputWithId[]>;
  getProtocolParameters?(): Promise<ProtocolParameters>;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpNodeClientConfig {
  readonly baseUrl: string;
  /** Per-request timeout. Default: 30000 */
  readonly timeoutMs?: number;
  readonly fetchFn?: FetchFn;
  readonly logger?: Logger;
}

export const PROTOCOL_VERSION = 2;

// =============================================================================
// Payload JSON
// =============================================================================

export interface UnlockJson {
  readonly type: number;
  readonly signature?: { readonly type: number; readonly publicKey: string; readonly signature: string };
  readonly reference?: number;
}

export interface TransactionPayloadJson {
  readonly type: number;
  readonly essence: {
    readonly type: number;
    readonly networkId: string;
    readonly inputs: readonly { readonly type: number; readonly transactionId: string; readonly transactionOutputIndex: number }[];
    readonly inputsCommitment: string;
    readonly outputs: readonly OutputJson[];
  };
  readonly unlocks: readonly UnlockJson[];
}

function unlockToJson(unlock: Unlock): UnlockJson {
  if (unlock.type === UNLOCK_TYPE.REFERENCE) return { type: unlock.type, reference: unlock.reference };
  return { type: unlock.type, signature: { ...unlock.signature } };
}

/** Node JSON of a transaction payload; u64 networkId as a decimal string. */
export function transactionPayloadToJson(payload: TransactionPayload): TransactionPayloadJson {
  const { essence } = payload;
  return {
    type: payload.type,
    essence: {
      type: essence.type,
      networkId: essence.networkId.toString(),
      inputs: essence.inputs.map((i) => ({ ...i })),
      inputsCommitment: essence.inputsCommitment,
      outputs: essence.outputs.map(outputToJson),
    },
    unlocks: payload.unlocks.map(unlockToJson),
  };
}

// =============================================================================
// Response schemas
// =============================================================================

const Hex32 = z
  .string()
  .regex(/^0x[0-9a-fA-F]{64}$/)
  .transform((s) => s.toLowerCase());

const SubmitResponseSchema = z.object({ blockId: Hex32 });

const BlockMetadataSchema = z.object({
  blockId: Hex32,
  referencedByMilestoneIndex: z.number().int().nonnegative().optional(),
  ledgerInclusionState: z.enum(["noTransaction", "included", "conflicting"]).optional(),
  conflictReason: z.number().int().nonnegative().optional(),
});

const OutputIdsPageSchema = z.object({
  items: z.array(z.string()),
  cursor: z.string().optional(),
});

const OutputResponseSchema = z.object({
  metadata: z.object({
    transactionId: Hex32,
    outputIndex: z.number().int().nonnegative(),
    isSpent: z.boolean(),
  }),
  output: z.unknown(),
});

const InfoResponseSchema = z.object({
  protocol: z.object({
    networkName: z.string().min(1),
    bech32Hrp: z.string().min(1),
    tokenSupply: z
      .string()
      .regex(/^\d+$/)
      .transform((s) => BigInt(s)),
    rentStructure: z.object({
      vByteCost: z.number().int().nonnegative(),
      vByteFactorData: z.number().int().nonnegative(),
      vByteFactorKey: z.number().int().nonnegative(),
    }),
  }),
});

const ErrorBodySchema = z.object({
  error: z.object({ code: z.string().optional(), message: z.string().optional() }),
});

// =============================================================================
// HTTP Client
// =============================================================================

interface RawResponse {
  readonly status: number;
  readonly body: unknown;
}

/** Request timeout and rate limiting: the node did not judge the request. */
const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

export class HttpNodeClient implements NetworkClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(config: HttpNodeClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.fetchFn = config.fetchFn ?? ((url, init) => globalThis.fetch(url, init));
    this.logger = config.logger ?? NOOP_LOGGER;
  }

  async submitTransaction(signed: SignedTransaction): Promise<SubmissionHandle> {
    const path = "/api/core/v2/blocks";
    const res = await this.request("POST", path, {
      protocolVersion: PROTOCOL_VERSION,
      payload: transactionPayloadToJson(signed.payload),
    });
    const { blockId } = this.parse(SubmitResponseSchema, this.expectOk(res, path), path);
    this.logger.debug({ blockId, transactionId: signed.transactionId }, "Block accepted by node");
    return { blockId, transactionId: signed.transactionId };
  }

  async getStatus(handle: SubmissionHandle, signal?: AbortSignal): Promise<InclusionStatus> {
    const path = `/api/core/v2/blocks/${handle.blockId}/metadata`;
    const res = await this.request("GET", path, undefined, signal);
    if (res.status === 404) {
      return { kind: "notFound" };
    }
    const metadata = this.parse(BlockMetadataSchema, this.expectOk(res, path), path);

    switch (metadata.ledgerInclusionState) {
      case "included":
        return {
          kind: "confirmed",
          reference: { blockId: metadata.blockId, milestoneIndex: metadata.referencedByMilestoneIndex ?? 0 },
        };
      case "conflicting":
        return { kind: "conflicting", reason: metadata.conflictReason };
      default:
        return { kind: "pending" };
    }
  }

  async fetchUnspentOutputs(bech32Address: string): Promise<OutputWithId[]> {
    const ids: string[] = [];
    let cursor: string | undefined;
    do {
      const query = new URLSearchParams({ address: bech32Address });
      if (cursor !== undefined) query.set("cursor", cursor);
      const path = `/api/indexer/v1/outputs/basic?${query.toString()}`;
      const page = this.parse(OutputIdsPageSchema, this.expectOk(await this.request("GET", path), path), path);
      ids.push(...page.items);
      cursor = page.cursor;
    } while (cursor !== undefined);

    const outputs: OutputWithId[] = [];
    for (const id of ids) {
      const path = `/api/core/v2/outputs/${id}`;
      const body = this.parse(OutputResponseSchema, this.expectOk(await this.request("GET", path), path), path);
      if (body.metadata.isSpent) continue;
      outputs.push({
        outputId: buildOutputId(body.metadata.transactionId, body.metadata.outputIndex),
        output: outputFromJson(body.output),
      });
    }
    return outputs;
  }

  async getProtocolParameters(): Promise<ProtocolParameters> {
    const path = "/api/core/v2/info";
    const { protocol } = this.parse(InfoResponseSchema, this.expectOk(await this.request("GET", path), path), path);
    return protocol;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async request(
    method: "GET" | "POST",
    path: string,
    body?: unknown,
    signal?: AbortSignal,
  ): Promise<RawResponse> {
    const init: RequestInit = {
      method,
      headers: { "Content-Type": "application/json", Accept: "application/json" },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted === true) onAbort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, { ...init, signal: controller.signal });
      return { status: response.status, body: await parseResponseBody(response) };
    } catch (error: unknown) {
      if (signal?.aborted === true) {
        throw new WalletError("CANCELLED", `${method} ${path} cancelled`, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new NetworkError(`${method} ${path} timed out after ${String(this.timeoutMs)}ms`, {
          timedOut: true,
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`${method} ${path} failed: ${message}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private expectOk(res: RawResponse, path: string): unknown {
    if (res.status >= 200 && res.status < 300) {
      return res.body;
    }
    const parsed = ErrorBodySchema.safeParse(res.body);
    const detail = parsed.success ? parsed.data.error.message : undefined;
    const message = `${path}: HTTP ${String(res.status)}${detail !== undefined ? ` ${detail}` : ""}`;
    if (res.status >= 400 && res.status < 500 && !TRANSIENT_CLIENT_STATUSES.has(res.status)) {
      throw new WalletError("REJECTED", `Node rejected request ${message}`);
    }
    throw new NetworkError(`Node error ${message}`, { status: res.status });
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, path: string): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new NetworkError(`Unexpected response from ${path}: ${result.error.message}`, { cause: result.error });
    }
    return result.data;
  }
}
