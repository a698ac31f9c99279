import { config } from '../config/index.js';

import {
  SecurityRejectionError,
  ValidationError,
} from '../errors/app-error.js';

import type { ValidatedTarget } from '../types/media.js';

import { isBlockedHostname, isIpLiteral } from './ip-blocklist.js';

export interface UrlPolicy {
  readonly allowedHosts: ReadonlySet<string>;
  readonly allowedQueryParams: readonly string[];
  readonly allowedPorts: ReadonlySet<string>;
  readonly maxUrlLength: number;
}

export const defaultUrlPolicy: UrlPolicy = {
  allowedHosts: config.security.allowedHosts,
  allowedQueryParams: config.security.allowedQueryParams,
  allowedPorts: config.security.allowedPorts,
  maxUrlLength: config.security.maxUrlLength,
};

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;
const SHORT_LINK_HOSTS: ReadonlySet<string> = new Set(['youtu.be']);
const ID_PATH_PREFIXES: ReadonlySet<string> = new Set([
  'shorts',
  'embed',
  'live',
  'v',
]);

function invalidFormat(message: string): ValidationError {
  return new ValidationError(message, 'InvalidFormat');
}

function parseAbsoluteUrl(rawUrl: string, policy: UrlPolicy): URL {
  if (typeof rawUrl !== 'string') throw invalidFormat('URL is required');

  const trimmed = rawUrl.trim();
  if (!trimmed) throw invalidFormat('URL cannot be empty');
  if (trimmed.length > policy.maxUrlLength) {
    throw invalidFormat(
      `URL exceeds maximum length of ${policy.maxUrlLength} characters`
    );
  }
  if (!URL.canParse(trimmed)) throw invalidFormat('Invalid URL format');

  const url = new URL(trimmed);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw invalidFormat('Only http: and https: URLs are allowed');
  }
  if (url.username || url.password) {
    throw invalidFormat('URLs with embedded credentials are not allowed');
  }
  return url;
}

function normalizeHostname(url: URL): string {
  const hostname = url.hostname.toLowerCase().replace(/\.+$/, '');
  if (!hostname) throw invalidFormat('URL must have a valid hostname');
  return hostname;
}

/**
 * Lower-cases the host, keeps only allow-listed query parameters (in their
 * original order) and drops the fragment. Idempotent.
 */
export function sanitizeMediaUrl(
  rawUrl: string,
  policy: UrlPolicy = defaultUrlPolicy
): string {
  const url = parseAbsoluteUrl(rawUrl, policy);
  url.hostname = normalizeHostname(url);

  const kept = new URLSearchParams();
  for (const [key, value] of url.searchParams) {
    if (policy.allowedQueryParams.includes(key)) {
      kept.append(key, value);
    }
  }
  url.search = kept.toString();
  url.hash = '';
  return url.href;
}

export function extractVideoId(url: URL): string | null {
  const hostname = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter(Boolean);

  let candidate: string | null | undefined;
  if (SHORT_LINK_HOSTS.has(hostname)) {
    candidate = segments[0];
  } else if (segments[0] === 'watch') {
    candidate = url.searchParams.get('v');
  } else if (segments[0] && ID_PATH_PREFIXES.has(segments[0])) {
    candidate = segments[1];
  }

  return candidate && VIDEO_ID_PATTERN.test(candidate) ? candidate : null;
}

/**
 * Textual validation of a media URL. Checks run in this order: format,
 * private/internal host, port, domain allow-list, resource identifier.
 * Resolved addresses are checked separately by `UrlGuard`.
 */
export function validateMediaUrl(
  rawUrl: string,
  policy: UrlPolicy = defaultUrlPolicy
): ValidatedTarget {
  const url = parseAbsoluteUrl(rawUrl, policy);
  const hostname = normalizeHostname(url);

  if (isBlockedHostname(hostname)) {
    throw new SecurityRejectionError('PrivateAddress');
  }
  if (isIpLiteral(hostname)) {
    throw new SecurityRejectionError('DisallowedDomain');
  }
  if (!policy.allowedPorts.has(url.port)) {
    throw new SecurityRejectionError('DisallowedPort');
  }
  if (!policy.allowedHosts.has(hostname)) {
    throw new SecurityRejectionError('DisallowedDomain');
  }

  const sanitizedUrl = sanitizeMediaUrl(url.href, policy);
  const videoId = extractVideoId(new URL(sanitizedUrl));
  if (!videoId) {
    throw invalidFormat('URL does not reference a media item');
  }

  return { sanitizedUrl, hostname, videoId };
}
