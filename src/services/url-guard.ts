import type { ValidatedTarget } from '../types/media.js';

import {
  defaultUrlPolicy,
  type UrlPolicy,
  validateMediaUrl,
} from '../utils/url-sanitizer.js';

import type { SafeDnsResolver } from './dns-resolver.js';
import { logDebug } from './logger.js';

/**
 * Turns an untrusted URL into a `ValidatedTarget`: textual checks first,
 * then every address the host resolves to must be public.
 */
export class UrlGuard {
  constructor(
    private readonly resolver: SafeDnsResolver,
    private readonly policy: UrlPolicy = defaultUrlPolicy
  ) {}

  async validate(
    rawUrl: string,
    signal?: AbortSignal
  ): Promise<ValidatedTarget> {
    const target = validateMediaUrl(rawUrl, this.policy);
    const addresses = await this.resolver.resolveAndValidate(
      target.hostname,
      signal
    );

    logDebug('Media URL accepted', {
      url: target.sanitizedUrl,
      addressCount: addresses.length,
    });
    return target;
  }
}
