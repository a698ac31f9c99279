import { describe, expect, test } from 'vitest';

import {
  isBlockedHostname,
  isBlockedIp,
  isIpLiteral,
  normalizeIpForBlockList,
} from '../src/utils/ip-blocklist.js';

describe('ip-blocklist', () => {
  describe('isBlockedIp', () => {
    test.each([
      '0.0.0.0',
      '10.1.2.3',
      '100.64.0.1',
      '127.0.0.1',
      '169.254.169.254',
      '172.16.0.1',
      '172.31.255.255',
      '192.168.1.1',
      '198.18.0.1',
      '224.0.0.251',
      '255.255.255.255',
      '::',
      '::1',
      'fd00::1',
      'fe80::1',
      'ff02::1',
      '64:ff9b::a9fe:a9fe',
      '::ffff:10.0.0.1',
      '::ffff:a9fe:a9fe',
    ])('blocks %s', (ip) => {
      expect(isBlockedIp(ip)).toBe(true);
    });

    test.each(['8.8.8.8', '93.184.216.34', '172.32.0.1', '2606:4700::1111'])(
      'allows %s',
      (ip) => {
        expect(isBlockedIp(ip)).toBe(false);
      }
    );

    test('returns false for non-IP input', () => {
      expect(isBlockedIp('youtube.com')).toBe(false);
    });
  });

  describe('normalizeIpForBlockList', () => {
    test('unwraps hex IPv4-mapped addresses', () => {
      expect(normalizeIpForBlockList('[::ffff:7f00:1]')).toEqual({
        ip: '127.0.0.1',
        family: 'ipv4',
      });
    });

    test('drops zone ids', () => {
      expect(normalizeIpForBlockList('fe80::1%eth0')).toEqual({
        ip: 'fe80::1',
        family: 'ipv6',
      });
    });
  });

  describe('isBlockedHostname', () => {
    test.each([
      'localhost',
      'LOCALHOST.',
      'app.localhost',
      'nas.local',
      'db.internal',
      'router.home.arpa',
      'metadata.google.internal',
      '',
    ])('blocks %j', (hostname) => {
      expect(isBlockedHostname(hostname)).toBe(true);
    });

    test('allows public names', () => {
      expect(isBlockedHostname('www.youtube.com')).toBe(false);
    });
  });

  test('isIpLiteral distinguishes addresses from names', () => {
    expect(isIpLiteral('8.8.8.8')).toBe(true);
    expect(isIpLiteral('[2606:4700::1111]')).toBe(true);
    expect(isIpLiteral('youtube.com')).toBe(false);
  });
});
