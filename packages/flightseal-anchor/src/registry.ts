import { createPublicClient, createWalletClient, getAddress, http, isHex, size, type Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';

import { FLIGHT_REGISTRY_ABI } from './abi.js';
import { AnchorConfigError, RegistryRevertError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export interface RegistryTx {
  tx_hash: Hex;
  block_number: bigint | null;
}

export interface OnchainCheckpoint {
  versionId: bigint;
  hash: Hex;
  /** Block timestamp, seconds since epoch. */
  timestamp: bigint;
}

/**
 * Flight registry operations, one method per contract function. Keys and
 * hashes are bytes32 hex.
 */
export interface FlightRegistry {
  readonly chainId: number | null;
  registerFlight(flightKey: Hex): Promise<RegistryTx>;
  addCheckpoint(flightKey: Hex, versionId: bigint, hash: Hex): Promise<RegistryTx>;
  closeFlight(flightKey: Hex): Promise<RegistryTx>;
  flightExists(flightKey: Hex): Promise<boolean>;
  isFlightClosed(flightKey: Hex): Promise<boolean>;
  getCheckpointCount(flightKey: Hex): Promise<bigint>;
  getCheckpoint(flightKey: Hex, index: bigint): Promise<OnchainCheckpoint>;
}

export interface EvmRegistryConfig {
  rpcUrl: string;
  chainId: number;
  registryAddress: string;
  chainName?: string;
  /** Required for writes; reads work without it. */
  privateKey?: string;
}

function parsePrivateKey(value: string): Hex {
  if (!isHex(value, { strict: true }) || size(value) !== 32) {
    throw new AnchorConfigError('Anchor private key must be 0x-prefixed 32-byte hex');
  }
  return value;
}

/**
 * viem-backed registry over JSON-RPC. Each write waits for its receipt and
 * fails if the transaction reverted.
 */
export function createViemFlightRegistry(
  config: EvmRegistryConfig,
  logger: Logger = silentLogger
): FlightRegistry {
  if (!Number.isSafeInteger(config.chainId) || config.chainId <= 0) {
    throw new AnchorConfigError(`Invalid chain id: ${config.chainId}`);
  }

  let address: Hex;
  try {
    address = getAddress(config.registryAddress);
  } catch {
    throw new AnchorConfigError(`Invalid registry address: ${config.registryAddress}`);
  }

  const chain = {
    id: config.chainId,
    name: config.chainName ?? `chain-${config.chainId}`,
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
    rpcUrls: { default: { http: [config.rpcUrl] } },
  };

  const publicClient = createPublicClient({ chain, transport: http(config.rpcUrl) });
  const account =
    config.privateKey === undefined ? null : privateKeyToAccount(parsePrivateKey(config.privateKey));
  const walletClient =
    account === null
      ? null
      : createWalletClient({ account, chain, transport: http(config.rpcUrl) });

  async function confirm(functionName: string, txHash: Hex): Promise<RegistryTx> {
    logger.info(`flight registry: ${functionName} submitted (${txHash})`);
    const receipt = await publicClient.waitForTransactionReceipt({ hash: txHash });
    if (receipt.status !== 'success') {
      throw new RegistryRevertError(`${functionName} reverted`, txHash);
    }
    logger.info(`flight registry: ${functionName} confirmed in block ${receipt.blockNumber}`);
    return { tx_hash: txHash, block_number: receipt.blockNumber };
  }

  function requireWallet() {
    if (walletClient === null) {
      throw new AnchorConfigError('Registry writes need a private key');
    }
    return walletClient;
  }

  return {
    chainId: config.chainId,

    async registerFlight(flightKey) {
      const txHash = await requireWallet().writeContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'registerFlight',
        args: [flightKey],
      });
      return confirm('registerFlight', txHash);
    },

    async addCheckpoint(flightKey, versionId, hash) {
      const txHash = await requireWallet().writeContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'addCheckpoint',
        args: [flightKey, versionId, hash],
      });
      return confirm('addCheckpoint', txHash);
    },

    async closeFlight(flightKey) {
      const txHash = await requireWallet().writeContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'closeFlight',
        args: [flightKey],
      });
      return confirm('closeFlight', txHash);
    },

    flightExists(flightKey) {
      return publicClient.readContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'flightExists',
        args: [flightKey],
      });
    },

    isFlightClosed(flightKey) {
      return publicClient.readContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'isFlightClosed',
        args: [flightKey],
      });
    },

    getCheckpointCount(flightKey) {
      return publicClient.readContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'getCheckpointCount',
        args: [flightKey],
      });
    },

    async getCheckpoint(flightKey, index) {
      const [versionId, hash, timestamp] = await publicClient.readContract({
        address,
        abi: FLIGHT_REGISTRY_ABI,
        functionName: 'getCheckpoint',
        args: [flightKey, index],
      });
      return { versionId, hash, timestamp };
    },
  };
}
