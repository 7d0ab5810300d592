/** Flight registry contract: one append-only checkpoint list per flight key. */
export const FLIGHT_REGISTRY_ABI = [
  {
    type: 'function',
    name: 'registerFlight',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'flightId', type: 'bytes32', internalType: 'bytes32' }],
    outputs: [],
  },
  {
    type: 'function',
    name: 'addCheckpoint',
    stateMutability: 'nonpayable',
    inputs: [
      { name: 'flightId', type: 'bytes32', internalType: 'bytes32' },
      { name: 'versionId', type: 'uint256', internalType: 'uint256' },
      { name: 'hash', type: 'bytes32', internalType: 'bytes32' },
    ],
    outputs: [],
  },
  {
    type: 'function',
    name: 'closeFlight',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'flightId', type: 'bytes32', internalType: 'bytes32' }],
    outputs: [],
  },
  {
    type: 'function',
    name: 'flightExists',
    stateMutability: 'view',
    inputs: [{ name: 'flightId', type: 'bytes32', internalType: 'bytes32' }],
    outputs: [{ name: '', type: 'bool', internalType: 'bool' }],
  },
  {
    type: 'function',
    name: 'isFlightClosed',
    stateMutability: 'view',
    inputs: [{ name: 'flightId', type: 'bytes32', internalType: 'bytes32' }],
    outputs: [{ name: '', type: 'bool', internalType: 'bool' }],
  },
  {
    type: 'function',
    name: 'getCheckpointCount',
    stateMutability: 'view',
    inputs: [{ name: 'flightId', type: 'bytes32', internalType: 'bytes32' }],
    outputs: [{ name: '', type: 'uint256', internalType: 'uint256' }],
  },
  {
    type: 'function',
    name: 'getCheckpoint',
    stateMutability: 'view',
    inputs: [
      { name: 'flightId', type: 'bytes32', internalType: 'bytes32' },
      { name: 'index', type: 'uint256', internalType: 'uint256' },
    ],
    outputs: [
      { name: 'versionId', type: 'uint256', internalType: 'uint256' },
      { name: 'hash', type: 'bytes32', internalType: 'bytes32' },
      { name: 'timestamp', type: 'uint256', internalType: 'uint256' },
    ],
  },
] as const;
