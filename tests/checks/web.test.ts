import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { evaluate } from '../../src/checks/evaluator.js';
import { noWeakCrypto, usesHttps, usesStrongHsts, webCompliance } from '../../src/checks/web.js';
import { diagnoseRow, WEB_ROW, webRecord } from '../fixtures/rows.js';

const cell = (value: boolean) => (value ? 'True' : 'False');

describe('web checks', () => {
  it('passes a live domain under a preloaded base domain through the fallback', () => {
    const record = webRecord({
      'Domain Supports HTTPS': 'False',
      'Domain Enforces HTTPS': 'False',
      'Domain Uses Strong HSTS': 'False',
      'Base Domain HSTS Preloaded': 'True',
    });
    expect(evaluate(usesHttps, record).result).toBe(true);
    expect(evaluate(webCompliance, record).result).toBe(true);
  });

  it('blames the HTTPS column and the preload flag when neither path holds', () => {
    const evaluation = evaluate(usesHttps, webRecord({ 'Domain Supports HTTPS': 'False' }));
    expect(evaluation.result).toBe(false);
    expect(evaluation.conditions.map((c) => [c.id, c.cause])).toEqual([
      ["'Domain Supports HTTPS'", true],
      ["'Live'", false],
      ["'Base Domain HSTS Preloaded'", true],
    ]);
  });

  it('fails weak crypto when the scan found weak ciphers', () => {
    const record = webRecord({ 'Domain Supports Weak Crypto': 'True', 'Web Hosts With Weak Crypto': 'www.example.gov' });
    expect(evaluate(noWeakCrypto, record).result).toBe(false);
  });

  it('stays undecided for strong HSTS when the column is blank and the fallback fails', () => {
    const evaluation = evaluate(usesStrongHsts, webRecord({ 'Domain Uses Strong HSTS': '' }));
    expect(evaluation.result).toBe('indeterminate');
  });

  it('matches the scorecard formula for every combination of inputs', () => {
    fc.assert(
      fc.property(fc.boolean(), fc.boolean(), fc.boolean(), fc.boolean(), fc.boolean(), (https, enforces, hsts, live, preloaded) => {
        const result = diagnoseRow('web', {
          ...WEB_ROW,
          'Domain Supports HTTPS': cell(https),
          'Domain Enforces HTTPS': cell(enforces),
          'Domain Uses Strong HSTS': cell(hsts),
          Live: cell(live),
          'Base Domain HSTS Preloaded': cell(preloaded),
        });
        const fallback = live && preloaded;
        expect(result.checks.get('Uses HTTPS')?.result).toBe(https || fallback);
        expect(result.checks.get('Enforces HTTPS')?.result).toBe(enforces || fallback);
        expect(result.checks.get('Uses Strong HSTS')?.result).toBe(hsts || fallback);
        expect(result.checks.get('BOD 18-01 Web Compliance')?.result).toBe((https && enforces && hsts) || fallback);
        expect(result.status).toBe((https && enforces && hsts) || fallback ? 'pass' : 'fail');
      }),
    );
  });
});
