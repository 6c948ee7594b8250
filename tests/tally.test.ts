import { describe, expect, it } from 'vitest';
import { tallyMail } from '../src/tally.js';
import { MAIL_ROW, diagnoseRow } from './fixtures/rows.js';

describe('tallyMail', () => {
  it('stops each domain at its first failed or undecided stage', () => {
    const results = [
      MAIL_ROW,
      { ...MAIL_ROW, Domain: 'www.agency.gov', 'Domain Is Base Domain': 'False', 'Domain Supports SMTP': 'False' },
      { ...MAIL_ROW, Domain: 'nostarttls.gov', 'Domain Supports STARTTLS': 'False' },
      { ...MAIL_ROW, Domain: 'norua.gov', 'DMARC Aggregate Report URIs': 'mailto:dmarc@norua.gov' },
      { ...MAIL_ROW, Domain: 'unsure.gov', 'Valid SPF': '' },
    ].map((row) => diagnoseRow('mail', row));

    expect(tallyMail(results)).toEqual({
      total_domains: 5,
      domains_checked: 4,
      domains_skipped: 1,
      smtp_valid: 3,
      smtp_invalid: 1,
      spf_covered: 2,
      spf_not_covered: 0,
      no_weak_crypto: 2,
      has_weak_crypto: 0,
      dmarc_valid: 2,
      dmarc_invalid: 0,
      bod_compliant: 1,
      bod_failed: 1,
      indeterminate: 1,
    });
  });

  it('counts nothing for an empty report', () => {
    expect(Object.values(tallyMail([])).every((count) => count === 0)).toBe(true);
  });
});
