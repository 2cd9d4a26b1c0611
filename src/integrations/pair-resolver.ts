/**
 * Pair / pool address resolution via Uniswap subgraphs (The Graph)
 *
 * - uniswap-v2: first pair found for (token0, token1), then (token1, token0)
 * - uniswap-v3: pools from both orderings, optionally filtered by fee tier,
 *   lowest fee tier wins
 *
 * Only Ethereum mainnet (chain id 1) is supported; anything else resolves to
 * null. A non-2xx answer for one ordering is skipped like an empty result.
 */

import axios from "axios";
import { MalformedResponseError, NetworkError, toError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";

export type Dex = "uniswap-v2" | "uniswap-v3";

export const SUPPORTED_DEXES: readonly Dex[] = ["uniswap-v2", "uniswap-v3"];

export interface ResolveRequest {
  token0: string;
  token1: string;
  dex: string;
  chainId?: number;
  /** uniswap-v3 fee tier, e.g. 3000 for 0.3% */
  feeTier?: number;
}

export interface GraphResponse {
  status: number;
  data: unknown;
}

/**
 * POST a GraphQL body, resolve with status and parsed JSON
 */
export type GraphTransport = (url: string, body: unknown) => Promise<GraphResponse>;

export const DEFAULT_SUBGRAPH_URLS: Readonly<Record<Dex, string>> = {
  "uniswap-v2": "https://api.thegraph.com/subgraphs/name/uniswap/uniswap-v2",
  "uniswap-v3": "https://api.thegraph.com/subgraphs/name/uniswap/uniswap-v3",
};

const V2_QUERY =
  "query($a:String!,$b:String!){pairs(where:{token0:$a, token1:$b}){ id token0{ id } token1{ id } }}";
const V3_QUERY =
  "query($a:String!,$b:String!){pools(where:{token0:$a, token1:$b}){ id token0{ id } token1{ id } feeTier }}";
const V3_QUERY_FEE =
  "query($a:String!,$b:String!,$fee:Int!){pools(where:{token0:$a, token1:$b, feeTier:$fee}){ id token0{ id } token1{ id } feeTier }}";

interface PoolRow {
  id: string;
  feeTier: number;
}

export const axiosGraphTransport: GraphTransport = async (url, body) => {
  const response = await axios.post<unknown>(url, body, {
    timeout: 10_000,
    validateStatus: () => true,
  });
  return { status: response.status, data: response.data };
};

export interface PairResolverOptions {
  transport?: GraphTransport;
  urls?: Partial<Record<Dex, string>>;
  logger?: Logger;
}

export class PairResolver {
  private readonly transport: GraphTransport;
  private readonly urls: Record<Dex, string>;
  private readonly logger?: Logger;

  constructor(options: PairResolverOptions = {}) {
    this.transport = options.transport ?? axiosGraphTransport;
    this.urls = { ...DEFAULT_SUBGRAPH_URLS, ...options.urls };
    this.logger = options.logger;
  }

  /**
   * Pair / pool address, or null when none exists or the venue is unsupported
   * @throws NetworkError when the subgraph cannot be reached
   */
  async resolveAddress(request: ResolveRequest): Promise<string | null> {
    const chainId = request.chainId ?? 1;
    if (chainId !== 1) return null;
    if (!isDex(request.dex)) return null;

    const a = request.token0.toLowerCase();
    const b = request.token1.toLowerCase();
    const url = this.urls[request.dex];

    if (request.dex === "uniswap-v2") {
      for (const [x, y] of [[a, b], [b, a]]) {
        const rows = await this.query(url, V2_QUERY, { a: x, b: y }, "pairs");
        const first = rows[0];
        if (first) return first.id;
      }
      return null;
    }

    const withFee = request.feeTier !== undefined;
    const pools: PoolRow[] = [];
    for (const [x, y] of [[a, b], [b, a]]) {
      const variables: Record<string, string | number> = { a: x, b: y };
      if (request.feeTier !== undefined) variables.fee = Math.trunc(request.feeTier);
      pools.push(...(await this.query(url, withFee ? V3_QUERY_FEE : V3_QUERY, variables, "pools")));
    }
    pools.sort((p, q) => p.feeTier - q.feeTier);
    return pools[0]?.id ?? null;
  }

  private async query(
    url: string,
    query: string,
    variables: Record<string, string | number>,
    field: "pairs" | "pools",
  ): Promise<PoolRow[]> {
    let response: GraphResponse;
    try {
      response = await this.transport(url, { query, variables });
    } catch (err) {
      throw new NetworkError(`Subgraph request failed: ${toError(err).message}`, url, toError(err));
    }
    if (response.status < 200 || response.status >= 300) {
      this.logger?.debug(`[PairResolver] ${url} answered ${response.status}`);
      return [];
    }
    return parseRows(response.data, field, url);
  }
}

function isDex(value: string): value is Dex {
  return SUPPORTED_DEXES.some((dex) => dex === value);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * data.<field>[] -> rows; missing data or field counts as empty
 */
export function parseRows(body: unknown, field: "pairs" | "pools", source: string): PoolRow[] {
  if (!isRecord(body)) {
    throw new MalformedResponseError("Subgraph response is not an object", source);
  }
  const data = body.data;
  if (!isRecord(data)) return [];
  const list = data[field];
  if (!Array.isArray(list)) return [];

  const rows: PoolRow[] = [];
  for (const item of list) {
    if (!isRecord(item) || typeof item.id !== "string") {
      throw new MalformedResponseError(`Subgraph ${field} entry without an id`, source);
    }
    const fee = Number(item.feeTier ?? Number.MAX_SAFE_INTEGER);
    rows.push({
      id: item.id,
      feeTier: Number.isFinite(fee) ? fee : Number.MAX_SAFE_INTEGER,
    });
  }
  return rows;
}
