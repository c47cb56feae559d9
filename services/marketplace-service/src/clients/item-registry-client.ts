import { Contract, JsonRpcProvider, Wallet, isCallException, type ContractRunner } from "ethers";
import type { Address } from "@itemex/shared";
import { normalizeAddress } from "../address.js";
import {
  failed,
  succeeded,
  type ExternalFailure,
  type ExternalResult,
  type ItemRegistry,
  type ItemRegistryResolver,
} from "../engine/external.js";

const ERC721_ABI = [
  "function ownerOf(uint256 tokenId) view returns (address)",
  "function getApproved(uint256 tokenId) view returns (address)",
  "function isApprovedForAll(address owner, address operator) view returns (bool)",
  "function safeTransferFrom(address from, address to, uint256 tokenId)",
] as const;

/**
 * Maps a failed contract call onto reason / panic / opaque. Only `Error(string)`
 * reverts count as a reason; empty data and custom errors stay opaque.
 */
export function classifyCallFailure(error: unknown): ExternalFailure {
  if (isCallException(error)) {
    const revert = error.revert;
    if (revert && revert.name === "Panic") {
      return { kind: "panic", code: Number(revert.args[0]) };
    }
    if (revert && revert.name === "Error" && typeof revert.args[0] === "string") {
      return { kind: "reason", reason: revert.args[0] };
    }
    return { kind: "opaque", data: error.data ?? "0x" };
  }
  return { kind: "opaque", data: error instanceof Error ? error.message : String(error) };
}

async function call<T>(
  invoke: () => Promise<unknown>,
  read: (value: unknown) => T | null,
  what: string,
): Promise<ExternalResult<T>> {
  let raw: unknown;
  try {
    raw = await invoke();
  } catch (error) {
    return failed(classifyCallFailure(error));
  }
  const value = read(raw);
  if (value === null) {
    return failed({ kind: "opaque", data: `unexpected ${what} result` });
  }
  return succeeded(value);
}

/** ERC-721 registry over JSON-RPC, with the marketplace wallet as the sending operator. */
export class EthersItemRegistry implements ItemRegistry {
  private readonly contract: Contract;

  constructor(
    registryAddress: Address,
    runner: ContractRunner,
    private readonly canSend: boolean,
  ) {
    this.contract = new Contract(registryAddress, ERC721_ABI, runner);
  }

  ownerOf(itemId: string): Promise<ExternalResult<Address>> {
    return call(
      () => this.contract.getFunction("ownerOf").staticCall(BigInt(itemId)),
      normalizeAddress,
      "ownerOf",
    );
  }

  getApproved(itemId: string): Promise<ExternalResult<Address>> {
    return call(
      () => this.contract.getFunction("getApproved").staticCall(BigInt(itemId)),
      normalizeAddress,
      "getApproved",
    );
  }

  isApprovedForAll(owner: Address, operator: Address): Promise<ExternalResult<boolean>> {
    return call(
      () => this.contract.getFunction("isApprovedForAll").staticCall(owner, operator),
      (value) => (typeof value === "boolean" ? value : null),
      "isApprovedForAll",
    );
  }

  async safeTransferFrom(from: Address, to: Address, itemId: string): Promise<ExternalResult<void>> {
    if (!this.canSend) {
      return failed({ kind: "reason", reason: "marketplace signer is not configured" });
    }
    const method = this.contract.getFunction("safeTransferFrom(address,address,uint256)");
    const receipt = await call(
      async () => {
        const tx = await method.send(from, to, BigInt(itemId));
        return tx.wait();
      },
      (value) => (value === null ? null : true),
      "safeTransferFrom receipt",
    );
    return receipt.ok ? succeeded(undefined) : receipt;
  }
}

export interface ChainRegistryOptions {
  rpcUrl: string;
  privateKey?: string;
}

/** One contract handle per registry address, sharing a provider and signer. */
export function buildEthersRegistryResolver(options: ChainRegistryOptions): ItemRegistryResolver {
  const provider = new JsonRpcProvider(options.rpcUrl);
  const runner: ContractRunner = options.privateKey
    ? new Wallet(options.privateKey, provider)
    : provider;
  const registries = new Map<string, EthersItemRegistry>();

  return (registryAddress) => {
    const key = registryAddress.toLowerCase();
    let registry = registries.get(key);
    if (!registry) {
      registry = new EthersItemRegistry(registryAddress, runner, !!options.privateKey);
      registries.set(key, registry);
    }
    return registry;
  };
}
