const IPV4_PATTERN =
  /^(0|[1-9]\d{0,2})\.(0|[1-9]\d{0,2})\.(0|[1-9]\d{0,2})\.(0|[1-9]\d{0,2})$/;

/**
 * Check a dotted-quad IPv4 address
 */
export function isValidIpv4(address: string): boolean {
  const match = IPV4_PATTERN.exec(address);
  if (!match) return false;
  return match.slice(1).every((octet) => Number(octet) <= 255);
}

/**
 * Convert a dotted-quad address to its 32-bit network-order value
 */
export function ipv4ToUint32(address: string): number {
  const match = IPV4_PATTERN.exec(address);
  if (!match) {
    throw new Error(`Invalid IPv4 address: ${address}`);
  }

  let value = 0;
  for (const part of match.slice(1)) {
    const octet = Number(part);
    if (octet > 255) {
      throw new Error(`Invalid IPv4 address: ${address}`);
    }
    value = value * 256 + octet;
  }
  return value;
}

/**
 * Convert a 32-bit value to dotted-quad form
 */
export function uint32ToIpv4(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new Error(`Invalid IPv4 value: ${value}`);
  }
  return [
    (value >>> 24) & 0xff,
    (value >>> 16) & 0xff,
    (value >>> 8) & 0xff,
    value & 0xff,
  ].join('.');
}

/**
 * Netmask for a prefix length, e.g. 24 -> "255.255.255.0"
 */
export function prefixLengthToMask(prefixLength: number): string {
  if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > 32) {
    throw new Error(`Invalid prefix length: ${prefixLength}`);
  }
  // Shifting by 32 is a no-op in JS, so /0 is handled separately
  const value = prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;
  return uint32ToIpv4(value);
}

/**
 * Prefix length of a contiguous netmask, e.g. "255.255.0.0" -> 16
 */
export function maskToPrefixLength(mask: string): number {
  const value = ipv4ToUint32(mask);
  let length = 0;
  while (length < 32 && (value & (0x80000000 >>> length)) !== 0) {
    length++;
  }
  if (prefixLengthToMask(length) !== mask) {
    throw new Error(`Non-contiguous netmask: ${mask}`);
  }
  return length;
}
