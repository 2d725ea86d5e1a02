import * as ipNum from 'ip-num';
import { IPV4_WIDTH, IPV6_WIDTH, cidrToHostcount, isValid, maxValue } from './arith';
import { NetworkError, err, ok, type Result } from './errors';
import { HostIterator, SubnetIterator, type NetworkFactory } from './iterator';

type Address = ipNum.IPv4 | ipNum.IPv6;

const PREFIX_PATTERN = /^\+?\d+$/;
const MAX_PREFIX_TEXT = 255;

function parsePrefix(text: string): number | undefined {
  if (!PREFIX_PATTERN.test(text)) {
    return undefined;
  }
  const prefix = Number(text);
  return prefix > MAX_PREFIX_TEXT ? undefined : prefix;
}

function splitCidr(text: string): [string, number] | undefined {
  const parts = text.split('/');
  if (parts.length !== 2) {
    return undefined;
  }
  const [address, prefixText] = parts;
  const prefix = parsePrefix(prefixText);
  if (prefix === undefined) {
    return undefined;
  }
  return [address, prefix];
}

/**
 * An aligned address block. Instances are immutable; every query is derived
 * from `base` and `cidr`.
 */
export abstract class AbstractNetwork<A extends Address> {
  public abstract readonly version: 4 | 6;
  public readonly base: bigint;
  public readonly cidr: number;

  protected constructor(base: bigint, cidr: number) {
    this.base = base;
    this.cidr = cidr;
  }

  protected abstract width(): number;
  protected abstract toAddress(value: bigint): A;

  public hostcount(): bigint {
    return cidrToHostcount(this.cidr, this.width());
  }
  public first(): A {
    return this.toAddress(this.base);
  }
  public last(): A {
    return this.toAddress(this.lastValue());
  }
  public netmask(): A {
    return this.toAddress(maxValue(this.width()) ^ (this.hostcount() - 1n));
  }
  /**
   * Strict interior test: the first and last address of the block are not contained.
   */
  public contains(address: A): boolean {
    const value = address.getValue();
    return value > this.base && value < this.lastValue();
  }
  /** True when `other` lies within this block. */
  public isSubnet(other: this): boolean {
    return this.base <= other.base && other.lastValue() <= this.lastValue();
  }
  /** True when this block lies within `other`. */
  public isSupernet(other: this): boolean {
    return this.base >= other.base && other.lastValue() >= this.lastValue();
  }
  public equals(other: this): boolean {
    return this.base === other.base && this.cidr === other.cidr;
  }
  public compare(other: this): number {
    if (this.base !== other.base) {
      return this.base < other.base ? -1 : 1;
    }
    if (this.cidr !== other.cidr) {
      return this.cidr < other.cidr ? -1 : 1;
    }
    return 0;
  }
  public intoHosts(): HostIterator<A> {
    return new HostIterator(this.base, this.lastValue(), (value) => this.toAddress(value));
  }
  public toString(): string {
    return `${this.first().toString()}/${this.cidr}`;
  }
  public toRangeString(): string {
    return `${this.first().toString()}-${this.last().toString()}`;
  }

  protected lastValue(): bigint {
    return this.base + this.hostcount() - 1n;
  }
  protected subnets<N>(newCidr: number, create: NetworkFactory<N>): SubnetIterator<N> {
    return new SubnetIterator({
      first: this.base,
      last: this.lastValue(),
      parentCidr: this.cidr,
      cidr: newCidr,
      width: this.width(),
      create,
    });
  }
}

export type NetworkV4Iterator = SubnetIterator<Ipv4Network>;
export type NetworkV6Iterator = SubnetIterator<Ipv6Network>;

export class Ipv4Network extends AbstractNetwork<ipNum.IPv4> {
  public static readonly MAX_NETMASK = maxValue(IPV4_WIDTH);
  public readonly version = 4;

  private constructor(base: bigint, cidr: number) {
    super(base, cidr);
  }

  public static fromNumber(first: bigint | number, cidr: number): Result<Ipv4Network> {
    if (typeof first === 'number' && !Number.isSafeInteger(first)) {
      return err(NetworkError.InvalidNetwork);
    }
    const value = BigInt(first);
    if (!isValid(value, cidr, IPV4_WIDTH)) {
      return err(NetworkError.InvalidNetwork);
    }
    return ok(new Ipv4Network(value, cidr));
  }

  public static fromOctets(a: number, b: number, c: number, d: number, cidr: number): Result<Ipv4Network> {
    const octets = [a, b, c, d];
    if (octets.some((octet) => !Number.isInteger(octet) || octet < 0 || octet > 0xff)) {
      return err(NetworkError.InvalidNetwork);
    }
    const first = octets.reduce((acc, octet) => (acc << 8n) | BigInt(octet), 0n);
    return Ipv4Network.fromNumber(first, cidr);
  }

  /**
   * Parses `a.b.c.d/n`. Malformed text is a `NetworkParseError`; well-formed text
   * describing a misaligned block is an `InvalidNetwork`.
   */
  public static parse(text: string): Result<Ipv4Network> {
    const parts = splitCidr(text);
    if (parts === undefined) {
      return err(NetworkError.NetworkParseError);
    }
    const [address, cidr] = parts;
    const [valid] = ipNum.Validator.isValidIPv4String(address);
    if (!valid) {
      return err(NetworkError.NetworkParseError);
    }
    return Ipv4Network.fromNumber(new ipNum.IPv4(address).getValue(), cidr);
  }

  public static compare(a: Ipv4Network, b: Ipv4Network): number {
    return a.compare(b);
  }

  public intoSubnets(newCidr: number): NetworkV4Iterator {
    return this.subnets(newCidr, Ipv4Network.fromNumber);
  }

  protected width(): number {
    return IPV4_WIDTH;
  }
  protected toAddress(value: bigint): ipNum.IPv4 {
    return new ipNum.IPv4(value);
  }
}

export class Ipv6Network extends AbstractNetwork<ipNum.IPv6> {
  public static readonly MAX_NETMASK = maxValue(IPV6_WIDTH);
  public readonly version = 6;

  private constructor(base: bigint, cidr: number) {
    super(base, cidr);
  }

  public static fromBigInt(first: bigint, cidr: number): Result<Ipv6Network> {
    if (!isValid(first, cidr, IPV6_WIDTH)) {
      return err(NetworkError.InvalidNetwork);
    }
    return ok(new Ipv6Network(first, cidr));
  }

  /** Parses `hexgroups/n`, with the same two-stage failures as {@link Ipv4Network.parse}. */
  public static parse(text: string): Result<Ipv6Network> {
    const parts = splitCidr(text);
    if (parts === undefined) {
      return err(NetworkError.NetworkParseError);
    }
    const [address, cidr] = parts;
    // a zone index would be dropped by the conversion to a number
    if (address.includes('%')) {
      return err(NetworkError.NetworkParseError);
    }
    const [valid] = ipNum.Validator.isValidIPv6String(address);
    if (!valid) {
      return err(NetworkError.NetworkParseError);
    }
    return Ipv6Network.fromBigInt(new ipNum.IPv6(address).getValue(), cidr);
  }

  public static compare(a: Ipv6Network, b: Ipv6Network): number {
    return a.compare(b);
  }

  public intoSubnets(newCidr: number): NetworkV6Iterator {
    return this.subnets(newCidr, Ipv6Network.fromBigInt);
  }

  protected width(): number {
    return IPV6_WIDTH;
  }
  protected toAddress(value: bigint): ipNum.IPv6 {
    return new ipNum.IPv6(value);
  }
}
