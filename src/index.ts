// Codec
export * from './codec/index.js';

// Address utilities
export {
  isValidIpv4,
  ipv4ToUint32,
  uint32ToIpv4,
  prefixLengthToMask,
  maskToPrefixLength,
} from './net/index.js';
