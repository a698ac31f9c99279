import { BlockList, isIP } from 'node:net';

const BLOCKED_IPV4_SUBNETS = [
  { subnet: '0.0.0.0', prefix: 8 },
  { subnet: '10.0.0.0', prefix: 8 },
  { subnet: '100.64.0.0', prefix: 10 },
  { subnet: '127.0.0.0', prefix: 8 },
  { subnet: '169.254.0.0', prefix: 16 },
  { subnet: '172.16.0.0', prefix: 12 },
  { subnet: '192.0.0.0', prefix: 24 },
  { subnet: '192.0.2.0', prefix: 24 },
  { subnet: '192.168.0.0', prefix: 16 },
  { subnet: '198.18.0.0', prefix: 15 },
  { subnet: '198.51.100.0', prefix: 24 },
  { subnet: '203.0.113.0', prefix: 24 },
  { subnet: '224.0.0.0', prefix: 4 },
  { subnet: '240.0.0.0', prefix: 4 },
] as const;

const BLOCKED_IPV6_SUBNETS = [
  { subnet: '::', prefix: 128 },
  { subnet: '::1', prefix: 128 },
  { subnet: '64:ff9b::', prefix: 96 },
  { subnet: '64:ff9b:1::', prefix: 48 },
  { subnet: '100::', prefix: 64 },
  { subnet: '2001:db8::', prefix: 32 },
  { subnet: 'fc00::', prefix: 7 },
  { subnet: 'fe80::', prefix: 10 },
  { subnet: 'fec0::', prefix: 10 },
  { subnet: 'ff00::', prefix: 8 },
] as const;

const BLOCKED_HOSTNAMES: ReadonlySet<string> = new Set([
  'localhost',
  'ip6-localhost',
  'ip6-loopback',
  'metadata.google.internal',
  'metadata.azure.com',
  'instance-data',
]);

const BLOCKED_HOST_SUFFIXES: readonly string[] = [
  '.localhost',
  '.local',
  '.internal',
  '.localdomain',
  '.home.arpa',
];

function createDefaultBlockList(): BlockList {
  const blockList = new BlockList();
  for (const entry of BLOCKED_IPV4_SUBNETS) {
    blockList.addSubnet(entry.subnet, entry.prefix, 'ipv4');
  }
  for (const entry of BLOCKED_IPV6_SUBNETS) {
    blockList.addSubnet(entry.subnet, entry.prefix, 'ipv6');
  }
  return blockList;
}

const BLOCK_LIST = createDefaultBlockList();

const IPV4_MAPPED_DOTTED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/;
const IPV4_MAPPED_HEX = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/;

/**
 * Unwraps IPv4-mapped IPv6 (`::ffff:a.b.c.d` and its hex form) so the
 * IPv4 rules apply to it, and strips brackets and zone ids.
 */
export function normalizeIpForBlockList(
  candidate: string
): { ip: string; family: 'ipv4' | 'ipv6' } | null {
  const withoutBrackets = candidate.trim().toLowerCase().replace(/^\[|\]$/g, '');
  const zoneIndex = withoutBrackets.indexOf('%');
  const ip = zoneIndex >= 0 ? withoutBrackets.slice(0, zoneIndex) : withoutBrackets;

  const version = isIP(ip);
  if (version === 4) return { ip, family: 'ipv4' };
  if (version !== 6) return null;

  const dotted = IPV4_MAPPED_DOTTED.exec(ip);
  if (dotted?.[1] && isIP(dotted[1]) === 4) {
    return { ip: dotted[1], family: 'ipv4' };
  }

  const hex = IPV4_MAPPED_HEX.exec(ip);
  if (hex?.[1] && hex[2]) {
    const high = Number.parseInt(hex[1], 16);
    const low = Number.parseInt(hex[2], 16);
    const mapped = [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
    return { ip: mapped, family: 'ipv4' };
  }

  return { ip, family: 'ipv6' };
}

export function isIpLiteral(candidate: string): boolean {
  return normalizeIpForBlockList(candidate) !== null;
}

/** True for loopback, private, link-local, multicast and reserved addresses. */
export function isBlockedIp(candidate: string): boolean {
  const normalized = normalizeIpForBlockList(candidate);
  if (!normalized) return false;
  return BLOCK_LIST.check(normalized.ip, normalized.family);
}

/** Textual check on a hostname before any resolution happens. */
export function isBlockedHostname(hostname: string): boolean {
  const normalized = hostname.trim().toLowerCase().replace(/\.+$/, '');
  if (!normalized) return true;
  if (BLOCKED_HOSTNAMES.has(normalized)) return true;
  if (BLOCKED_HOST_SUFFIXES.some((suffix) => normalized.endsWith(suffix))) {
    return true;
  }
  return isBlockedIp(normalized);
}
