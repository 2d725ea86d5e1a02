import { describe, it, expect } from 'vitest';
import { IPV4_WIDTH } from '../arith';
import { NetworkError, err, unwrap } from '../errors';
import { SubnetIterator } from '../iterator';
import { Ipv4Network } from '../network';

const network = (text: string): Ipv4Network => unwrap(Ipv4Network.parse(text));

describe('Ipv4Network.intoSubnets', () => {
  it('should split a /24 into two /25 stepping past the parent base', () => {
    const subnets = [...network('1.1.1.0/24').intoSubnets(25)];
    expect(subnets).toHaveLength(2);
    expect(subnets.every((subnet) => subnet.cidr === 25)).toBe(true);
    expect(subnets[0].first().toString()).toBe('1.1.1.128');
    expect(subnets.map((subnet) => subnet.toString())).toEqual(['1.1.1.128/25', '1.1.2.0/25']);
  });

  it('should never emit the block at the parent base', () => {
    const subnets = [...network('10.0.0.0/22').intoSubnets(24)].map((subnet) => subnet.toString());
    expect(subnets).toEqual(['10.0.1.0/24', '10.0.2.0/24', '10.0.3.0/24', '10.0.4.0/24']);
  });

  it('should stop once the cursor reaches the last address for single addresses', () => {
    const subnets = [...network('1.1.1.0/30').intoSubnets(32)].map((subnet) => subnet.toString());
    expect(subnets).toEqual(['1.1.1.1/32', '1.1.1.2/32', '1.1.1.3/32']);
  });

  it('should yield the following block for the same prefix', () => {
    const subnets = [...network('1.1.1.0/24').intoSubnets(24)].map((subnet) => subnet.toString());
    expect(subnets).toEqual(['1.1.2.0/24']);
  });

  it('should yield nothing for a single address parent', () => {
    expect([...network('1.1.1.1/32').intoSubnets(32)]).toEqual([]);
  });

  it('should yield nothing for a shorter prefix', () => {
    expect([...network('1.0.0.0/24').intoSubnets(16)]).toEqual([]);
    expect(network('1.0.0.0/24').intoSubnets(16).remaining()).toBe(0n);
  });

  it('should yield nothing for a prefix longer than the width', () => {
    expect([...network('1.0.0.0/24').intoSubnets(33)]).toEqual([]);
  });

  it('should end when the next block falls outside the address space', () => {
    const iterator = network('255.255.255.0/24').intoSubnets(25);
    expect(iterator.remaining()).toBe(1n);
    expect([...iterator].map((subnet) => subnet.toString())).toEqual(['255.255.255.128/25']);
    expect(iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('should yield nothing when splitting the whole space into itself', () => {
    const iterator = network('0.0.0.0/0').intoSubnets(0);
    expect(iterator.remaining()).toBe(0n);
    expect([...iterator]).toEqual([]);
  });

  it('should count the children still to come', () => {
    const iterator = network('1.1.1.0/24').intoSubnets(25);
    expect(iterator.remaining()).toBe(2n);
    iterator.next();
    expect(iterator.remaining()).toBe(1n);
    iterator.next();
    expect(iterator.remaining()).toBe(0n);
    expect(iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('should enumerate a /8 lazily', () => {
    const iterator = unwrap(Ipv4Network.fromNumber(16777216, 8)).intoSubnets(32);
    expect(iterator.remaining()).toBe(16777215n);
    const first = iterator.next();
    expect(first.done).toBe(false);
    expect(first.done ? undefined : first.value.first().toString()).toBe('1.0.0.1');
    expect(iterator.remaining()).toBe(16777214n);
  });

  it('should end the sequence when the factory rejects a child', () => {
    const iterator = new SubnetIterator<Ipv4Network>({
      first: 0n,
      last: 255n,
      parentCidr: 24,
      cidr: 26,
      width: IPV4_WIDTH,
      create: (first, cidr) => (first >= 128n ? err(NetworkError.InvalidNetwork) : Ipv4Network.fromNumber(first, cidr)),
    });
    expect([...iterator].map((subnet) => subnet.toString())).toEqual(['0.0.0.64/26']);
    expect(iterator.remaining()).toBe(0n);
    expect(iterator.next().done).toBe(true);
  });
});

describe('Ipv4Network.intoHosts', () => {
  it('should enumerate the interior of a /30', () => {
    const hosts = [...network('1.1.1.0/30').intoHosts()].map((host) => host.toString());
    expect(hosts).toEqual(['1.1.1.1', '1.1.1.2']);
  });

  it('should enumerate exactly the addresses the network contains', () => {
    const net = network('1.1.1.0/24');
    const hosts = [...net.intoHosts()];
    expect(hosts).toHaveLength(254);
    expect(hosts[0].toString()).toBe('1.1.1.1');
    expect(hosts[hosts.length - 1].toString()).toBe('1.1.1.254');
    expect(hosts.every((host) => net.contains(host))).toBe(true);
  });

  it('should yield nothing for /31 and /32', () => {
    expect([...network('1.1.1.0/31').intoHosts()]).toEqual([]);
    expect([...network('1.1.1.1/32').intoHosts()]).toEqual([]);
  });

  it('should walk /0 without materializing it', () => {
    const hosts = network('0.0.0.0/0').intoHosts();
    expect(hosts.remaining()).toBe(4294967294n);
    const first = hosts.next();
    expect(first.done ? undefined : first.value.toString()).toBe('0.0.0.1');
    expect(hosts.remaining()).toBe(4294967293n);
  });
});
