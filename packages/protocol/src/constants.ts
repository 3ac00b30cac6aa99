import { LATEST_PROTOCOL_VERSION } from '#jsonrpc';

/** protocol versions this implementation can speak, preferred first */
export const SUPPORTED_PROTOCOL_VERSIONS = [
  LATEST_PROTOCOL_VERSION,
  '2025-03-26',
  '2024-11-05',
] as const;
