import { Ipv4Network, printTable, unwrap } from '../src';

const network = unwrap(Ipv4Network.fromNumber(16777216, 8));
const first = network.intoSubnets(32).next();
if (!first.done) {
  console.log(first.value.first().toString());
}

printTable(unwrap(Ipv4Network.parse('10.0.0.0/22')), { subnetCidr: 24 });
