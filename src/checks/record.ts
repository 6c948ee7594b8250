import { DOMAIN_COLUMN, fieldCatalog } from './fields.js';
import type { Field, FieldSpec, FieldValue, ReportRecord, ReportType } from './types.js';

export type RawRow = Readonly<Record<string, string | undefined>>;

function parseBoolean(text: string): FieldValue {
  const lowered = text.toLowerCase();
  if (lowered === 'true') return { kind: 'boolean', value: true };
  if (lowered === 'false') return { kind: 'boolean', value: false };
  return { kind: 'unparseable', reason: 'unrecognized' };
}

function parseEnum(text: string, values: readonly string[]): FieldValue {
  const lowered = text.toLowerCase();
  return values.includes(lowered)
    ? { kind: 'enum', value: lowered }
    : { kind: 'unparseable', reason: 'unrecognized' };
}

function parseInteger(text: string): FieldValue {
  if (!/^\d+$/.test(text)) {
    return { kind: 'unparseable', reason: 'unrecognized' };
  }
  const parsed = Number(text);
  return Number.isSafeInteger(parsed)
    ? { kind: 'integer', value: parsed }
    : { kind: 'unparseable', reason: 'unrecognized' };
}

/**
 * Splits a comma separated cell ("mailto:a@x.gov, mailto:b@x.gov").
 * An empty cell is an empty list, not a parse failure.
 */
function parseList(text: string): FieldValue {
  const items = text
    .split(',')
    .map((item) => item.trim().toLowerCase())
    .filter(Boolean);
  return { kind: 'list', value: Object.freeze(items) };
}

export function parseFieldValue(spec: FieldSpec, raw: string | undefined): FieldValue {
  if (raw === undefined) {
    return { kind: 'unparseable', reason: 'missing' };
  }
  const text = raw.trim();
  if (spec.kind === 'list') {
    return parseList(text);
  }
  if (text === '') {
    return { kind: 'unparseable', reason: 'empty' };
  }
  switch (spec.kind) {
    case 'boolean':
      return parseBoolean(text);
    case 'enum':
      return parseEnum(text, spec.values);
    case 'integer':
      return parseInteger(text);
  }
}

/**
 * Builds the record for one CSV row. Every field of the report type is
 * present afterwards; bad cells are marked unparseable instead of throwing.
 */
export function buildRecord(reportType: ReportType, row: RawRow): ReportRecord {
  const fields = new Map<string, Field>();
  for (const [name, spec] of fieldCatalog(reportType)) {
    const raw = Object.prototype.hasOwnProperty.call(row, name) ? row[name] : undefined;
    const field: Field = { name, raw, value: parseFieldValue(spec, raw) };
    fields.set(name, Object.freeze(field));
  }
  return Object.freeze({
    reportType,
    domain: (row[DOMAIN_COLUMN] ?? '').trim(),
    fields,
  });
}

export function isUnparseable(field: Field): boolean {
  return field.value.kind === 'unparseable';
}

/** Text shown for a field in reports: the parsed value, or the raw cell for unparseable fields. */
export function formatFieldValue(field: Field): string {
  const { value } = field;
  switch (value.kind) {
    case 'boolean':
      return value.value ? 'True' : 'False';
    case 'enum':
      return value.value;
    case 'integer':
      return String(value.value);
    case 'list':
      return value.value.join(';');
    case 'unparseable':
      return field.raw === undefined ? '<missing>' : `<unparseable: "${field.raw}">`;
  }
}
