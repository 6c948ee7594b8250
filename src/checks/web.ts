import { fieldBuilders } from './expr.js';
import type { WebField } from './fields.js';
import type { Rule } from './types.js';

const { is, atLeast, and, or, not, ref, rule } = fieldBuilders<WebField>();

/** One year, the shortest max-age the HTTPS scan accepts as strong HSTS. */
export const HSTS_MIN_MAX_AGE = 31536000;

// A live domain whose base domain is HSTS preloaded passes regardless of its own endpoints.
export const hstsPreloadFallback = rule(
  'HSTS Preload Fallback',
  and(is('Live'), is('Base Domain HSTS Preloaded')),
  'Live domain under an HSTS preloaded base domain',
);

export const usesHttps = rule('Uses HTTPS', or(is('Domain Supports HTTPS'), ref(hstsPreloadFallback)));

export const enforcesHttps = rule('Enforces HTTPS', or(is('Domain Enforces HTTPS'), ref(hstsPreloadFallback)));

export const usesStrongHsts = rule('Uses Strong HSTS', or(is('Domain Uses Strong HSTS'), ref(hstsPreloadFallback)));

export const validHsts = rule(
  'Valid HSTS',
  and(
    is('Domain Supports HTTPS'),
    is('HSTS'),
    atLeast('HSTS Max Age', HSTS_MIN_MAX_AGE),
    is('HSTS Entire Domain'),
  ),
  'HSTS header served over HTTPS with a max-age of at least one year, covering subdomains',
);

export const noWeakCrypto = rule('No Weak Crypto', not(is('Domain Supports Weak Crypto')));

export const webCompliance = rule(
  'BOD 18-01 Web Compliance',
  or(
    and(is('Domain Supports HTTPS'), is('Domain Enforces HTTPS'), is('Domain Uses Strong HSTS')),
    ref(hstsPreloadFallback),
  ),
);

export const WEB_RULES: readonly Rule<WebField>[] = [
  hstsPreloadFallback,
  usesHttps,
  enforcesHttps,
  usesStrongHsts,
  validHsts,
  noWeakCrypto,
  webCompliance,
];
