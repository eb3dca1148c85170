import IPMatching from 'ip-matching';
import * as x from 'x-value';

export const AddressFamily = x.union([x.literal('ipv4'), x.literal('ipv6')]);

export type AddressFamily = x.TypeOf<typeof AddressFamily>;

export const DDNSType = x.union([x.literal('A'), x.literal('AAAA')]);

export type DDNSType = x.TypeOf<typeof DDNSType>;

export function getDDNSType(family: AddressFamily): DDNSType {
  return family === 'ipv4' ? 'A' : 'AAAA';
}

export function getAddressFamily(type: DDNSType): AddressFamily {
  return type === 'A' ? 'ipv4' : 'ipv6';
}

/**
 * Returns the canonical textual form (RFC 5952 for IPv6) of an address of
 * the given family, so that two spellings of the same address compare
 * equal. Returns `undefined` if the text is not an exact address of that
 * family.
 */
export function normalizeAddress(
  family: AddressFamily,
  text: string,
): string | undefined {
  const ip = IPMatching.getIP(text.trim());

  if (!ip || !ip.exact()) {
    return undefined;
  }

  if (family === 'ipv4') {
    return ip.type === 'IPv4' ? ip.parts.join('.') : undefined;
  } else {
    return ip.type === 'IPv6' ? formatIPv6(ip.parts) : undefined;
  }
}

function formatIPv6(groups: number[]): string {
  // Longest run of zero groups (leftmost on ties), only compressed if it
  // spans at least two groups.
  let runStart = -1;
  let runLength = 0;

  for (let index = 0; index < groups.length; ) {
    if (groups[index] !== 0) {
      index++;
      continue;
    }

    let end = index;

    while (end < groups.length && groups[end] === 0) {
      end++;
    }

    if (end - index > runLength) {
      runStart = index;
      runLength = end - index;
    }

    index = end;
  }

  const hex = (group: number): string => group.toString(16);

  if (runLength < 2) {
    return groups.map(hex).join(':');
  }

  return `${groups.slice(0, runStart).map(hex).join(':')}::${groups
    .slice(runStart + runLength)
    .map(hex)
    .join(':')}`;
}
