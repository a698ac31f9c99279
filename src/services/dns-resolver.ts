import dns, { type LookupAddress } from 'node:dns';

import {
  RequestAbortedError,
  SecurityRejectionError,
} from '../errors/app-error.js';

import { createErrorWithCode, isSystemError } from '../utils/error-utils.js';
import { isBlockedHostname, isBlockedIp } from '../utils/ip-blocklist.js';

import { logDebug, logWarn } from './logger.js';

export type HostLookup = (hostname: string) => Promise<LookupAddress[]>;

export const systemLookup: HostLookup = (hostname) =>
  dns.promises.lookup(hostname, { all: true });

// ---------------------------------------------------------------------------
// Generic timeout wrapper
// ---------------------------------------------------------------------------

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal,
  onAbort: () => Error = () => new RequestAbortedError()
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let abortListener: (() => void) | undefined;

  const race = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      timer = setTimeout(() => reject(onTimeout()), timeoutMs);
      timer.unref();
    }
    if (signal) {
      abortListener = () => reject(onAbort());
      if (signal.aborted) abortListener();
      else signal.addEventListener('abort', abortListener, { once: true });
    }
  });

  try {
    return await Promise.race([promise, race]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && abortListener) {
      signal.removeEventListener('abort', abortListener);
    }
  }
}

// ---------------------------------------------------------------------------
// SafeDnsResolver
// ---------------------------------------------------------------------------

export interface SafeDnsResolverOptions {
  lookup?: HostLookup;
  timeoutMs: number;
}

/**
 * Resolves a hostname and rejects it when any returned address is private,
 * loopback, link-local or otherwise non-public.
 */
export class SafeDnsResolver {
  private readonly lookup: HostLookup;
  private readonly timeoutMs: number;

  constructor(options: SafeDnsResolverOptions) {
    this.lookup = options.lookup ?? systemLookup;
    this.timeoutMs = options.timeoutMs;
  }

  async resolveAndValidate(
    hostname: string,
    signal?: AbortSignal
  ): Promise<LookupAddress[]> {
    const normalizedHostname = hostname
      .trim()
      .toLowerCase()
      .replace(/^\[|\]$/g, '')
      .replace(/\.+$/, '');

    if (signal?.aborted) throw new RequestAbortedError();
    if (isBlockedHostname(normalizedHostname)) {
      throw new SecurityRejectionError('PrivateAddress');
    }

    const addresses = await this.lookupAddresses(normalizedHostname, signal);

    for (const addr of addresses) {
      if (addr.family !== 4 && addr.family !== 6) {
        logWarn('Unexpected address family returned by DNS', {
          hostname: normalizedHostname,
          family: addr.family,
        });
        throw new SecurityRejectionError('UnresolvableHost');
      }
      if (isBlockedIp(addr.address)) {
        logWarn('Resolved address is in a blocked range', {
          hostname: normalizedHostname,
        });
        throw new SecurityRejectionError('PrivateAddress');
      }
    }

    return addresses;
  }

  private async lookupAddresses(
    hostname: string,
    signal?: AbortSignal
  ): Promise<LookupAddress[]> {
    let addresses: LookupAddress[];
    try {
      addresses = await withTimeout(
        this.lookup(hostname),
        this.timeoutMs,
        () =>
          createErrorWithCode(`DNS lookup timed out for ${hostname}`, 'ETIMEOUT'),
        signal
      );
    } catch (error) {
      if (error instanceof RequestAbortedError) throw error;
      logDebug('DNS lookup failed', {
        hostname,
        ...(isSystemError(error) ? { code: error.code } : {}),
      });
      throw new SecurityRejectionError('UnresolvableHost');
    }

    if (addresses.length === 0) {
      throw new SecurityRejectionError('UnresolvableHost');
    }
    return addresses;
  }
}
