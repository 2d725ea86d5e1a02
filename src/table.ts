import { table } from 'table';
import { IPV4_WIDTH, IPV6_WIDTH } from './arith';
import type { Ipv4Network, Ipv6Network } from './network';

const DEFAULT_ROW_LIMIT = 256;

type AddressFormat = 'CIDR' | 'RANGE';
export const ADDRESS_FORMAT_CIDR: AddressFormat = 'CIDR';
export const ADDRESS_FORMAT_RANGE: AddressFormat = 'RANGE';

export type Network = Ipv4Network | Ipv6Network;

export interface TableConfigProps {
  addressFormat?: AddressFormat;
  // list the subnets of this prefix instead of the network itself
  subnetCidr?: number;
  rowLimit?: number;
}

function formatAddress(network: Network, addressFormat: AddressFormat): string {
  if (addressFormat === ADDRESS_FORMAT_CIDR) {
    return network.toString();
  } else {
    return network.toRangeString();
  }
}

function validate(network: Network, subnetCidr: number): void {
  const width = network.version === 4 ? IPV4_WIDTH : IPV6_WIDTH;
  if (!Number.isInteger(subnetCidr) || subnetCidr < network.cidr || subnetCidr > width) {
    throw new Error(`The prefix ${subnetCidr} is not between ${network.cidr} and ${width}, inclusive.`);
  }
}

export function getContents(network: Network, config: TableConfigProps = {}): string[][] {
  const addressFormat = config.addressFormat ?? ADDRESS_FORMAT_CIDR;
  const rowLimit = config.rowLimit ?? DEFAULT_ROW_LIMIT;
  const header = ['network', 'hostcount'];
  if (config.subnetCidr === undefined) {
    return [header, [formatAddress(network, addressFormat), network.hostcount().toString()]];
  }
  validate(network, config.subnetCidr);
  const rows: string[][] = [];
  for (const subnet of network.intoSubnets(config.subnetCidr)) {
    if (rows.length >= rowLimit) {
      break;
    }
    rows.push([formatAddress(subnet, addressFormat), subnet.hostcount().toString()]);
  }
  return [header, ...rows];
}

export function renderTable(network: Network, config: TableConfigProps = {}): string {
  const tableConfig = {
    header: {
      content: `Network ${network.toString()}`,
    },
  };
  return table(getContents(network, config), tableConfig);
}

export function printTable(network: Network, config: TableConfigProps = {}): void {
  console.log(renderTable(network, config));
}

export function printCsv(network: Network, config: TableConfigProps = {}): void {
  const csv = getContents(network, config)
    .map((row) => row.join(','))
    .join('\n');
  console.log(csv);
}
