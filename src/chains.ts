export const ALL_CHAINS = [
  // Ethereum & L2s
  "ethereum",
  "arbitrum",
  "optimism",
  "base",
  "zksync",
  "linea",
  "scroll",
  "zkevm",
  // Alt L1s
  "bsc",
  "polygon",
  "avalanche",
  "fantom",
  "cronos",
  "gnosis",
  "celo",
  "moonbeam"
] as const;

export type ChainId = (typeof ALL_CHAINS)[number];

export type ChainInfo = {
  id: ChainId;
  name: string;
  /** EVM chain id; also the key Etherscan v2 uses. */
  chainId: number;
  publicRpcUrl: string;
  alchemySubdomain?: string;
  etherscanV2: boolean;
};

const CHAIN_LIST: readonly ChainInfo[] = [
  { id: "ethereum", name: "Ethereum", chainId: 1, publicRpcUrl: "https://ethereum-rpc.publicnode.com", alchemySubdomain: "eth-mainnet", etherscanV2: true },
  { id: "arbitrum", name: "Arbitrum One", chainId: 42161, publicRpcUrl: "https://arb1.arbitrum.io/rpc", alchemySubdomain: "arb-mainnet", etherscanV2: true },
  { id: "optimism", name: "OP Mainnet", chainId: 10, publicRpcUrl: "https://mainnet.optimism.io", alchemySubdomain: "opt-mainnet", etherscanV2: true },
  { id: "base", name: "Base", chainId: 8453, publicRpcUrl: "https://mainnet.base.org", alchemySubdomain: "base-mainnet", etherscanV2: false },
  { id: "zksync", name: "zkSync Era", chainId: 324, publicRpcUrl: "https://mainnet.era.zksync.io", etherscanV2: true },
  { id: "linea", name: "Linea", chainId: 59144, publicRpcUrl: "https://rpc.linea.build", etherscanV2: true },
  { id: "scroll", name: "Scroll", chainId: 534352, publicRpcUrl: "https://rpc.scroll.io", etherscanV2: true },
  { id: "zkevm", name: "Polygon zkEVM", chainId: 1101, publicRpcUrl: "https://zkevm-rpc.com", etherscanV2: true },
  { id: "bsc", name: "BNB Smart Chain", chainId: 56, publicRpcUrl: "https://bsc-dataseed.bnbchain.org", etherscanV2: false },
  { id: "polygon", name: "Polygon", chainId: 137, publicRpcUrl: "https://polygon-rpc.com", alchemySubdomain: "polygon-mainnet", etherscanV2: true },
  { id: "avalanche", name: "Avalanche C-Chain", chainId: 43114, publicRpcUrl: "https://api.avax.network/ext/bc/C/rpc", etherscanV2: false },
  { id: "fantom", name: "Fantom", chainId: 250, publicRpcUrl: "https://rpcapi.fantom.network", etherscanV2: false },
  { id: "cronos", name: "Cronos", chainId: 25, publicRpcUrl: "https://evm.cronos.org", etherscanV2: false },
  { id: "gnosis", name: "Gnosis", chainId: 100, publicRpcUrl: "https://rpc.gnosischain.com", etherscanV2: true },
  { id: "celo", name: "Celo", chainId: 42220, publicRpcUrl: "https://forno.celo.org", etherscanV2: true },
  { id: "moonbeam", name: "Moonbeam", chainId: 1284, publicRpcUrl: "https://rpc.api.moonbeam.network", etherscanV2: true }
];

export const CHAINS: ReadonlyMap<ChainId, ChainInfo> = new Map(CHAIN_LIST.map((c) => [c.id, c]));

const CHAIN_IDS: ReadonlySet<string> = new Set(ALL_CHAINS);

export function isChainId(v: string): v is ChainId {
  return CHAIN_IDS.has(v);
}

export function getChainInfo(chain: ChainId): ChainInfo {
  const info = CHAINS.get(chain);
  if (!info) throw new Error(`No chain info for ${chain}`);
  return info;
}

export function listChains(): ChainInfo[] {
  return [...CHAIN_LIST];
}
