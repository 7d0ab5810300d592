export { FLIGHT_REGISTRY_ABI } from './abi.js';
export { AnchorConfigError, RegistryRevertError } from './errors.js';
export { EvmAnchor } from './evm-anchor.js';
export type { CheckpointAnchorReceipt, EvmAnchorOptions } from './evm-anchor.js';
export { fromBytes32, missionKey, toBytes32 } from './keys.js';
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export { MemoryFlightRegistry } from './memory-registry.js';
export type { MemoryFlightRegistryOptions } from './memory-registry.js';
export { createViemFlightRegistry } from './registry.js';
export type { EvmRegistryConfig, FlightRegistry, OnchainCheckpoint, RegistryTx } from './registry.js';
