import { FetchRequest, JsonRpcProvider, Network } from "ethers";
import { config } from "../core/config.js";
import { ALL_CHAINS, getChainInfo, type ChainId } from "../chains.js";

const providers = new Map<ChainId, JsonRpcProvider>();

export function getRpcUrl(chain: ChainId): string {
  const override = config.rpcUrlOverride(chain);
  if (override) return override;
  const info = getChainInfo(chain);
  if (config.alchemyApiKey && info.alchemySubdomain) {
    return `https://${info.alchemySubdomain}.g.alchemy.com/v2/${config.alchemyApiKey}`;
  }
  return info.publicRpcUrl;
}

export function getChainProvider(chain: ChainId): JsonRpcProvider {
  const existing = providers.get(chain);
  if (existing) return existing;

  const req = new FetchRequest(getRpcUrl(chain));
  req.timeout = config.rpcTimeoutMs;
  // Static network: skip the eth_chainId lookup on every new provider.
  const network = Network.from(getChainInfo(chain).chainId);
  const provider = new JsonRpcProvider(req, network, { staticNetwork: network });
  providers.set(chain, provider);
  return provider;
}

export function getAllChainProviders(): Map<ChainId, JsonRpcProvider> {
  return new Map(ALL_CHAINS.map((c) => [c, getChainProvider(c)]));
}
