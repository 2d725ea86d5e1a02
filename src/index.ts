export * from './arith';
export * from './errors';
export * from './iterator';
export * from './network';
export * as ipnetwork from './ipnetwork';
export type { IpNetwork } from './ipnetwork';
export * from './table';
