import { UnknownReportTypeError } from '../errors.js';
import type { FieldSpec, ReportType } from './types.js';

const BOOLEAN = { kind: 'boolean' } as const;
const INTEGER = { kind: 'integer' } as const;
const LIST = { kind: 'list' } as const;
const DMARC_POLICY = { kind: 'enum', values: ['none', 'quarantine', 'reject'] } as const;

/** Column that identifies the scanned domain in both report types. */
export const DOMAIN_COLUMN = 'Domain';

// Column names as written by the HTTPS scanner export.
export const WEB_FIELDS = {
  Live: BOOLEAN,
  'Base Domain HSTS Preloaded': BOOLEAN,
  'Domain Supports HTTPS': BOOLEAN,
  'Domain Enforces HTTPS': BOOLEAN,
  'Domain Uses Strong HSTS': BOOLEAN,
  HSTS: BOOLEAN,
  'HSTS Max Age': INTEGER,
  'HSTS Entire Domain': BOOLEAN,
  'Domain Supports Weak Crypto': BOOLEAN,
  'Web Hosts With Weak Crypto': LIST,
} satisfies Record<string, FieldSpec>;

// Column names as written by the mail scanner export.
export const MAIL_FIELDS = {
  'Domain Is Base Domain': BOOLEAN,
  'Domain Supports SMTP': BOOLEAN,
  'Domain Supports STARTTLS': BOOLEAN,
  'SPF Record': BOOLEAN,
  'Valid SPF': BOOLEAN,
  'Valid DMARC': BOOLEAN,
  'Valid DMARC Record on Base Domain': BOOLEAN,
  'DMARC Policy': DMARC_POLICY,
  'DMARC Subdomain Policy': DMARC_POLICY,
  'DMARC Policy Percentage': INTEGER,
  'DMARC Aggregate Report URIs': LIST,
  'Domain Supports Weak Crypto': BOOLEAN,
} satisfies Record<string, FieldSpec>;

export type WebField = keyof typeof WEB_FIELDS;
export type MailField = keyof typeof MAIL_FIELDS;

export function fieldCatalog(reportType: ReportType): ReadonlyMap<string, FieldSpec> {
  switch (reportType) {
    case 'web':
      return new Map<string, FieldSpec>(Object.entries(WEB_FIELDS));
    case 'mail':
      return new Map<string, FieldSpec>(Object.entries(MAIL_FIELDS));
    default:
      throw new UnknownReportTypeError(String(reportType));
  }
}
