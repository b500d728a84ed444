export {
  isValidIpv4,
  ipv4ToUint32,
  uint32ToIpv4,
  prefixLengthToMask,
  maskToPrefixLength,
} from './ipv4.js';
