import { fieldBuilders } from './expr.js';
import type { MailField } from './fields.js';
import type { Rule } from './types.js';

const { is, oneOf, equals, contains, and, or, not, ref, rule } = fieldBuilders<MailField>();

/** Aggregate report address every compliant DMARC record must list. */
export const REQUIRED_RUA_URI = 'mailto:reports@dmarc.cyber.dhs.gov';

export const validDmarc = rule(
  'Valid DMARC',
  or(is('Valid DMARC'), is('Valid DMARC Record on Base Domain')),
  'DMARC record on the domain itself or inherited from its base domain',
);

export const dmarcPolicyReject = rule(
  'DMARC Policy Reject',
  and(ref(validDmarc), oneOf('DMARC Policy', 'reject')),
);

export const dmarcSubdomainPolicyReject = rule(
  'DMARC Subdomain Policy Reject',
  and(ref(validDmarc), or(not(is('Domain Is Base Domain')), oneOf('DMARC Subdomain Policy', 'reject'))),
  'Only base domains need sp=reject',
);

export const dmarcPolicyPercentage = rule(
  'DMARC Policy Percentage 100',
  and(ref(validDmarc), equals('DMARC Policy Percentage', 100)),
);

export const dmarcPolicyOfReject = rule(
  'DMARC Policy of Reject',
  and(ref(dmarcPolicyReject), ref(dmarcSubdomainPolicyReject), ref(dmarcPolicyPercentage)),
);

// Subdomains without an SPF record of their own are covered by a reject policy.
export const spfCovered = rule(
  'SPF Covered',
  or(
    and(is('Domain Is Base Domain'), is('Valid SPF')),
    and(
      not(is('Domain Is Base Domain')),
      or(is('Valid SPF'), and(not(is('SPF Record')), ref(dmarcPolicyOfReject))),
    ),
  ),
);

export const dmarcAggregateReportUri = rule(
  'DMARC Aggregate Report URI',
  and(ref(validDmarc), contains('DMARC Aggregate Report URIs', REQUIRED_RUA_URI)),
);

export const smtpValid = rule(
  'SMTP Valid',
  or(and(is('Domain Supports SMTP'), is('Domain Supports STARTTLS')), not(is('Domain Supports SMTP'))),
  'Mail servers that accept SMTP must offer STARTTLS',
);

export const noWeakCrypto = rule('No Weak Crypto', not(is('Domain Supports Weak Crypto')));

export const domainInScope = rule(
  'Domain In Scope',
  or(is('Domain Is Base Domain'), is('Domain Supports SMTP')),
  'Subdomains without SMTP are skipped by the mail scorecard',
);

export const mailCompliance = rule(
  'BOD 18-01 Mail Compliance',
  and(
    ref(smtpValid),
    ref(spfCovered),
    ref(noWeakCrypto),
    ref(dmarcPolicyOfReject),
    ref(dmarcAggregateReportUri),
  ),
);

export const MAIL_RULES: readonly Rule<MailField>[] = [
  validDmarc,
  dmarcPolicyReject,
  dmarcSubdomainPolicyReject,
  dmarcPolicyPercentage,
  dmarcPolicyOfReject,
  spfCovered,
  dmarcAggregateReportUri,
  smtpValid,
  noWeakCrypto,
  domainInScope,
  mailCompliance,
];
