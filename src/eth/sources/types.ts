import type { ChainId } from "../../chains.js";

/** An Approval log as providers return it, before decoding. */
export type RawApprovalLog = {
  address: string;
  topics: readonly string[];
  data: string;
};

export type SourceFailure = {
  source: string;
  error: string;
};

export type ApprovalLogsResult = {
  logs: RawApprovalLog[];
  /** Source that produced the answer; null when none answered. */
  source: string | null;
  failures: SourceFailure[];
};

export interface ChainDataSource {
  readonly name: string;
  supports(chain: ChainId): boolean;
  fetchApprovalLogs(wallet: string, chain: ChainId, signal?: AbortSignal): Promise<RawApprovalLog[]>;
  /** Empty array when the address holds no code. */
  fetchBytecode(address: string, chain: ChainId, signal?: AbortSignal): Promise<Uint8Array>;
  /** Read-only contract call; returns hex return data. */
  call(to: string, data: string, chain: ChainId, signal?: AbortSignal): Promise<string>;
}

/** The slice of an ethers provider the RPC source uses. */
export interface RpcClient {
  getLogs(filter: {
    fromBlock: number;
    toBlock: string;
    topics: string[];
  }): Promise<ReadonlyArray<{ address: string; topics: ReadonlyArray<string>; data: string }>>;
  getCode(address: string): Promise<string>;
  call(tx: { to: string; data: string }): Promise<string>;
}
