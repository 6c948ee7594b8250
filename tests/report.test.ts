import { fileURLToPath } from 'node:url';
import pino from 'pino';
import { describe, expect, it } from 'vitest';
import { evaluate } from '../src/checks/evaluator.js';
import { is, rule } from '../src/checks/expr.js';
import { buildRecord } from '../src/checks/record.js';
import type { DomainResult } from '../src/checks/types.js';
import { diagnoseFile } from '../src/diagnose.js';
import { render, renderCsv, renderJson, renderText, selectResults } from '../src/report.js';
import { MAIL_ROW, WEB_ROW, diagnoseRow } from './fixtures/rows.js';

const WEB_CSV = fileURLToPath(new URL('./fixtures/web-report.csv', import.meta.url));

const liveCheck = rule('Live Check', is('Live'));

function liveResult(live: string): DomainResult {
  const record = buildRecord('web', { Domain: 'a.gov', Live: live });
  const evaluation = evaluate(liveCheck, record);
  return {
    domain: 'a.gov',
    record,
    checks: new Map([[evaluation.rule, evaluation]]),
    status: evaluation.result === true ? 'pass' : 'fail',
  };
}

const MISSING_WEB_VALUES = [
  '      Base Domain HSTS Preloaded : <missing>',
  '      Domain Supports HTTPS : <missing>',
  '      Domain Enforces HTTPS : <missing>',
  '      Domain Uses Strong HSTS : <missing>',
  '      HSTS : <missing>',
  '      HSTS Max Age : <missing>',
  '      HSTS Entire Domain : <missing>',
  '      Domain Supports Weak Crypto : <missing>',
  '      Web Hosts With Weak Crypto : <missing>',
];

describe('selectResults', () => {
  it('keeps failing and undecided domains unless passing ones are requested', () => {
    const results = [liveResult('True'), liveResult('False')];
    expect(selectResults(results, false).map((result) => result.status)).toEqual(['fail']);
    expect(selectResults(results, true)).toHaveLength(2);
  });
});

describe('rendering the web fixture', () => {
  const logger = pino({ level: 'silent' });
  const results = diagnoseFile(WEB_CSV, { reportType: 'web', domains: [], logger });

  it('leaves out a compliant domain whose base domain is not preloaded', () => {
    expect(selectResults(results, false).map((result) => result.domain)).toEqual(['legacy.gov', 'app.preloaded.gov']);
    const listed = renderText(results, { reportType: 'web', includePassing: false })
      .split('\n')
      .filter((line) => / \[\w+\]$/.test(line));
    expect(listed).toEqual(['  legacy.gov [fail]', '  app.preloaded.gov [pass]']);
  });

  it('keeps weak crypto visible on an otherwise compliant domain', () => {
    const result = diagnoseRow('web', { ...WEB_ROW, 'Domain Supports Weak Crypto': 'True' });
    expect(result.status).toBe('pass');
    expect(selectResults([result], false)).toEqual([result]);
  });
});

describe('renderText', () => {
  it('lists values, formulas and causes for a failing domain', () => {
    const text = renderText([liveResult('False')], { reportType: 'web', includePassing: false });
    expect(text.split('\n')).toEqual([
      'Domains with Failing Checks ::',
      '  a.gov [fail]',
      '    Values:',
      '      Live : False',
      ...MISSING_WEB_VALUES,
      '    Checks:',
      "      Live Check : 'Live'",
      '      = False',
      "        'Live' : False (Live = False) <- cause",
      '',
    ]);
  });

  it('says none when every domain passes', () => {
    const result = diagnoseRow('web', WEB_ROW);
    expect(renderText([result], { reportType: 'web', includePassing: false })).toBe(
      'Domains with Failing Checks ::\n  none\n',
    );
  });

  it('appends the scorecard tally for mail reports', () => {
    const text = renderText([diagnoseRow('mail', MAIL_ROW)], { reportType: 'mail', includePassing: false });
    const lines = text.trimEnd().split('\n');
    expect(lines.slice(0, 3)).toEqual(['Domains with Failing Checks ::', '  none', '']);
    expect(lines).toContain('total_domains :: 1');
    expect(lines).toContain('bod_compliant :: 1');
    expect(lines.at(-1)).toBe('indeterminate :: 0');
  });
});

describe('renderCsv', () => {
  it('writes one column per field and per check', () => {
    const csv = renderCsv([liveResult('False')], { reportType: 'web', includePassing: false });
    const [header, row] = csv.split('\n');
    expect(header).toBe(
      "Domain,Live,Base Domain HSTS Preloaded,Domain Supports HTTPS,Domain Enforces HTTPS,Domain Uses Strong HSTS,HSTS,HSTS Max Age,HSTS Entire Domain,Domain Supports Weak Crypto,Web Hosts With Weak Crypto,Live Check - 'Live'",
    );
    expect(row).toBe(`a.gov,False,${Array(9).fill('<missing>').join(',')},False`);
  });

  it('is empty without results', () => {
    expect(renderCsv([], { reportType: 'web', includePassing: true })).toBe('');
  });
});

describe('renderJson', () => {
  it('serializes each selected domain with its checks', () => {
    const parsed: unknown = JSON.parse(renderJson([liveResult('False')], { reportType: 'web', includePassing: false }));
    expect(parsed).toMatchObject([
      {
        domain: 'a.gov',
        status: 'fail',
        fields: { Live: 'False', HSTS: '<missing>' },
        checks: {
          'Live Check': {
            result: false,
            formula: "'Live'",
            conditions: [{ id: "'Live'", field: 'Live', value: false, literal: 'False', unparseable: false, cause: true }],
          },
        },
      },
    ]);
  });
});

describe('render', () => {
  it('dispatches on the output format', () => {
    const results = [liveResult('False')];
    const options = { reportType: 'web', includePassing: false } as const;
    expect(render('json', results, options)).toBe(renderJson(results, options));
    expect(render('csv', results, options)).toBe(renderCsv(results, options));
    expect(render('text', results, options)).toBe(renderText(results, options));
  });
});
