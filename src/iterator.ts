import type { Result } from './errors';
import { cidrToHostcount, isValidCidr, maxValue } from './arith';

export type NetworkFactory<N> = (first: bigint, cidr: number) => Result<N>;

export interface SubnetIteratorProps<N> {
  first: bigint;
  last: bigint;
  parentCidr: number;
  cidr: number;
  width: number;
  create: NetworkFactory<N>;
}

/**
 * Walks blocks of a fixed prefix inside a parent block. Each step advances the
 * cursor by one child before constructing it, so the child at the parent's own
 * base is never emitted, and the walk goes on while the cursor is below the
 * parent's last address.
 *
 * A target prefix shorter than the parent's, or longer than the address width,
 * gives an empty sequence. If a child cannot be constructed the sequence ends there.
 */
export class SubnetIterator<N> implements IterableIterator<N> {
  public readonly cidr: number;
  private readonly max: bigint;
  private readonly limit: bigint;
  private readonly stepping: bigint;
  private readonly create: NetworkFactory<N>;
  private current: bigint;
  private exhausted: boolean;

  constructor(props: SubnetIteratorProps<N>) {
    this.cidr = props.cidr;
    this.current = props.first;
    this.max = props.last;
    this.limit = maxValue(props.width);
    this.create = props.create;
    this.exhausted = !isValidCidr(props.cidr, props.width) || props.cidr < props.parentCidr;
    this.stepping = this.exhausted ? 0n : cidrToHostcount(props.cidr, props.width);
  }

  public next(): IteratorResult<N> {
    if (this.exhausted || this.current >= this.max) {
      this.exhausted = true;
      return { done: true, value: undefined };
    }
    this.current += this.stepping;
    const network = this.create(this.current, this.cidr);
    if (!network.ok) {
      this.exhausted = true;
      return { done: true, value: undefined };
    }
    return { done: false, value: network.value };
  }

  /**
   * Children still to come, counting a step past the end of the address space
   * as the end of the sequence.
   */
  public remaining(): bigint {
    if (this.exhausted || this.current >= this.max) {
      return 0n;
    }
    const steps = (this.max - this.current + this.stepping - 1n) / this.stepping;
    const fit = (this.limit - this.current) / this.stepping;
    return steps < fit ? steps : fit;
  }

  public [Symbol.iterator](): SubnetIterator<N> {
    return this;
  }
}

/**
 * Walks the interior addresses of a block, the same set `contains` accepts:
 * everything strictly between the first and the last address.
 */
export class HostIterator<A> implements IterableIterator<A> {
  private current: bigint;
  private readonly max: bigint;
  private readonly toAddress: (value: bigint) => A;

  constructor(first: bigint, last: bigint, toAddress: (value: bigint) => A) {
    this.current = first + 1n;
    this.max = last - 1n;
    this.toAddress = toAddress;
  }

  public next(): IteratorResult<A> {
    if (this.current > this.max) {
      return { done: true, value: undefined };
    }
    const address = this.toAddress(this.current);
    this.current += 1n;
    return { done: false, value: address };
  }

  public remaining(): bigint {
    return this.current > this.max ? 0n : this.max - this.current + 1n;
  }

  public [Symbol.iterator](): HostIterator<A> {
    return this;
  }
}
