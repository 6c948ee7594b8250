import {
  dmarcAggregateReportUri,
  dmarcPolicyOfReject,
  domainInScope,
  noWeakCrypto,
  smtpValid,
  spfCovered,
} from './checks/mail.js';
import type { DomainResult } from './checks/types.js';

const EMPTY_TALLY = {
  total_domains: 0,
  domains_checked: 0,
  domains_skipped: 0,
  smtp_valid: 0,
  smtp_invalid: 0,
  spf_covered: 0,
  spf_not_covered: 0,
  no_weak_crypto: 0,
  has_weak_crypto: 0,
  dmarc_valid: 0,
  dmarc_invalid: 0,
  bod_compliant: 0,
  bod_failed: 0,
  indeterminate: 0,
};

export type MailTally = typeof EMPTY_TALLY;

type TallyKey = keyof MailTally;

// Each stage only counts domains that passed every earlier stage.
const CASCADE: ReadonlyArray<{ check: string; passed: TallyKey; failed: TallyKey }> = [
  { check: domainInScope.name, passed: 'domains_checked', failed: 'domains_skipped' },
  { check: smtpValid.name, passed: 'smtp_valid', failed: 'smtp_invalid' },
  { check: spfCovered.name, passed: 'spf_covered', failed: 'spf_not_covered' },
  { check: noWeakCrypto.name, passed: 'no_weak_crypto', failed: 'has_weak_crypto' },
  { check: dmarcPolicyOfReject.name, passed: 'dmarc_valid', failed: 'dmarc_invalid' },
  { check: dmarcAggregateReportUri.name, passed: 'bod_compliant', failed: 'bod_failed' },
];

/** Scorecard counts for a mail report; a domain stops at its first failed or undecidable stage. */
export function tallyMail(results: readonly DomainResult[]): MailTally {
  const tally: MailTally = { ...EMPTY_TALLY };

  for (const result of results) {
    tally.total_domains += 1;
    for (const stage of CASCADE) {
      const value = result.checks.get(stage.check)?.result ?? 'indeterminate';
      if (value === 'indeterminate') {
        tally.indeterminate += 1;
        break;
      }
      if (!value) {
        tally[stage.failed] += 1;
        break;
      }
      tally[stage.passed] += 1;
    }
  }

  return tally;
}
