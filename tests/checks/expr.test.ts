import { describe, expect, it } from 'vitest';
import { conditionsOf, describe as describeExpr, is, oneOf } from '../../src/checks/expr.js';
import { dmarcSubdomainPolicyReject, spfCovered } from '../../src/checks/mail.js';
import { usesHttps, webCompliance } from '../../src/checks/web.js';

describe('condition labels', () => {
  it('quotes field names the way the report columns read', () => {
    expect(is('Live').id).toBe("'Live'");
    expect(is('Live', false).id).toBe("not 'Live'");
    expect(oneOf('DMARC Policy', 'reject').id).toBe(`'DMARC Policy' == "reject"`);
    expect(oneOf('DMARC Policy', 'Quarantine', 'reject').id).toBe(`'DMARC Policy' in ("quarantine", "reject")`);
  });
});

describe('describe', () => {
  it('names embedded rules instead of expanding them', () => {
    expect(describeExpr(usesHttps.expr)).toBe("'Domain Supports HTTPS' or [HSTS Preload Fallback]");
  });

  it('parenthesises nested connectives', () => {
    expect(describeExpr(webCompliance.expr)).toBe(
      "('Domain Supports HTTPS' and 'Domain Enforces HTTPS' and 'Domain Uses Strong HSTS') or [HSTS Preload Fallback]",
    );
    expect(describeExpr(dmarcSubdomainPolicyReject.expr)).toBe(
      `[Valid DMARC] and (not 'Domain Is Base Domain' or 'DMARC Subdomain Policy' == "reject")`,
    );
  });
});

describe('conditionsOf', () => {
  it('walks into sub-rules', () => {
    const fields = new Set(conditionsOf(spfCovered.expr).map((c) => c.field));
    expect(fields.has('DMARC Policy Percentage')).toBe(true);
    expect(fields.has('Domain Supports SMTP')).toBe(false);
  });
});
