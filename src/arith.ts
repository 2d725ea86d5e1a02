export const IPV4_WIDTH = 32;
export const IPV6_WIDTH = 128;

export function maxValue(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

export function isValidCidr(cidr: number, width: number): boolean {
  return Number.isInteger(cidr) && cidr >= 0 && cidr <= width;
}

/**
 * Number of addresses covered by a prefix, network and last address included.
 * A /0 covers the whole space, 2^width.
 */
export function cidrToHostcount(cidr: number, width: number): bigint {
  return 1n << BigInt(width - cidr);
}

/**
 * A block is valid when its base address sits on a boundary of its own size.
 */
export function isValid(first: bigint, cidr: number, width: number): boolean {
  if (!isValidCidr(cidr, width)) {
    return false;
  }
  if (first < 0n || first > maxValue(width)) {
    return false;
  }
  return first % cidrToHostcount(cidr, width) === 0n;
}
