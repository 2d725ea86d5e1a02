import * as ipNum from 'ip-num';
import { NetworkError, err, ok, type Result } from './errors';
import { Ipv4Network, Ipv6Network } from './network';

export type IpNetwork = { _: 'V4'; network: Ipv4Network } | { _: 'V6'; network: Ipv6Network };

export const V4 = (network: Ipv4Network): IpNetwork => ({ _: 'V4', network });
export const V6 = (network: Ipv6Network): IpNetwork => ({ _: 'V6', network });

/**
 * Parses either family. An address part holding a `:` is read as IPv6,
 * anything else as IPv4.
 */
export function parseIpNetwork(text: string): Result<IpNetwork> {
  const address = text.split('/')[0];
  if (address.includes(':')) {
    const parsed = Ipv6Network.parse(text);
    return parsed.ok ? ok(V6(parsed.value)) : parsed;
  }
  const parsed = Ipv4Network.parse(text);
  return parsed.ok ? ok(V4(parsed.value)) : parsed;
}

export function version(ip: IpNetwork): 4 | 6 {
  switch (ip._) {
    case 'V4':
      return 4;
    case 'V6':
      return 6;
  }
}

export function hostcount(ip: IpNetwork): bigint {
  switch (ip._) {
    case 'V4':
      return ip.network.hostcount();
    case 'V6':
      return ip.network.hostcount();
  }
}

export function first(ip: IpNetwork): ipNum.IPv4 | ipNum.IPv6 {
  switch (ip._) {
    case 'V4':
      return ip.network.first();
    case 'V6':
      return ip.network.first();
  }
}

export function last(ip: IpNetwork): ipNum.IPv4 | ipNum.IPv6 {
  switch (ip._) {
    case 'V4':
      return ip.network.last();
    case 'V6':
      return ip.network.last();
  }
}

export function netmask(ip: IpNetwork): ipNum.IPv4 | ipNum.IPv6 {
  switch (ip._) {
    case 'V4':
      return ip.network.netmask();
    case 'V6':
      return ip.network.netmask();
  }
}

/** Strict interior test; an address of the other family is a `CidrMismatch`. */
export function contains(ip: IpNetwork, address: ipNum.IPv4 | ipNum.IPv6): Result<boolean> {
  if (ip._ === 'V4' && address instanceof ipNum.IPv4) {
    return ok(ip.network.contains(address));
  }
  if (ip._ === 'V6' && address instanceof ipNum.IPv6) {
    return ok(ip.network.contains(address));
  }
  return err(NetworkError.CidrMismatch);
}

export function toString(ip: IpNetwork): string {
  switch (ip._) {
    case 'V4':
      return ip.network.toString();
    case 'V6':
      return ip.network.toString();
  }
}

export function equals(a: IpNetwork, b: IpNetwork): boolean {
  if (a._ === 'V4' && b._ === 'V4') {
    return a.network.equals(b.network);
  }
  if (a._ === 'V6' && b._ === 'V6') {
    return a.network.equals(b.network);
  }
  return false;
}

function sameFamily<T>(a: IpNetwork, b: IpNetwork, v4: (x: Ipv4Network, y: Ipv4Network) => T, v6: (x: Ipv6Network, y: Ipv6Network) => T): Result<T> {
  if (a._ === 'V4' && b._ === 'V4') {
    return ok(v4(a.network, b.network));
  }
  if (a._ === 'V6' && b._ === 'V6') {
    return ok(v6(a.network, b.network));
  }
  return err(NetworkError.CidrMismatch);
}

/** Orders networks of one family; comparing across families is a `CidrMismatch`. */
export function compareIpNetworks(a: IpNetwork, b: IpNetwork): Result<number> {
  return sameFamily(
    a,
    b,
    (x, y) => x.compare(y),
    (x, y) => x.compare(y)
  );
}

export function isSubnet(a: IpNetwork, b: IpNetwork): Result<boolean> {
  return sameFamily(
    a,
    b,
    (x, y) => x.isSubnet(y),
    (x, y) => x.isSubnet(y)
  );
}

export function isSupernet(a: IpNetwork, b: IpNetwork): Result<boolean> {
  return sameFamily(
    a,
    b,
    (x, y) => x.isSupernet(y),
    (x, y) => x.isSupernet(y)
  );
}
