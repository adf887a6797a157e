import { BlockList, isIP } from 'node:net';
import isPrivate from 'private-ip';

export type IpClass = 'private' | 'public';

/**
 * Special-purpose blocks `private-ip` rejects that are still routed past the
 * local network: shared address space (RFC 6598), which carrier-grade NAT
 * uses for subscriber-facing hops, and multicast.
 */
const routedSpecialBlocks = new BlockList();
routedSpecialBlocks.addSubnet('100.64.0.0', 10, 'ipv4');
routedSpecialBlocks.addSubnet('224.0.0.0', 4, 'ipv4');
routedSpecialBlocks.addSubnet('ff00::', 8, 'ipv6');

/**
 * Private covers RFC1918, loopback, link-local and the reserved and
 * documentation blocks. Anything that is not an IP literal yields `undefined`.
 */
export const classifyIp = (address: string): IpClass | undefined => {
	const family = isIP(address);

	if (family === 0) {
		return undefined;
	}

	if (routedSpecialBlocks.check(address, family === 4 ? 'ipv4' : 'ipv6')) {
		return 'public';
	}

	return isPrivate(address) ? 'private' : 'public';
};
