import fs from 'node:fs';
import path from 'node:path';
import { domainStatus, evaluateAll } from './checks/evaluator.js';
import { DOMAIN_COLUMN } from './checks/fields.js';
import { buildRecord } from './checks/record.js';
import { getRegistry } from './checks/registry.js';
import type { DomainResult, ReportType } from './checks/types.js';
import type { OutputFormat } from './config.js';
import { readReportCsv } from './csv-reader.js';
import { CsvFormatError } from './errors.js';
import type { Logger } from './logger.js';
import { render } from './report.js';

export interface DiagnoseOptions {
  reportType: ReportType;
  domains: string[];
  logger: Logger;
}

export interface RunOptions extends DiagnoseOptions {
  csvPath: string;
  format: OutputFormat;
  includePassing: boolean;
  failExit: boolean;
  color: boolean;
}

export interface RunOutcome {
  output: string;
  exitCode: number;
}

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INDETERMINATE = 2;
export const EXIT_FAILING = 3;

export function diagnoseCsv(csvText: string, options: DiagnoseOptions): DomainResult[] {
  const { logger } = options;
  const registry = getRegistry(options.reportType);
  const { header, rows } = readReportCsv(csvText);

  const missing = [...registry.fields.keys()].filter((name) => !header.includes(name));
  if (missing.length) {
    logger.warn({ missing }, 'CSV is missing columns; checks reading them will be indeterminate');
  }

  const wanted = new Set(options.domains.map((domain) => domain.toLowerCase()));
  logger.debug({ domains: [...wanted] }, 'Domains provided');

  const results: DomainResult[] = [];
  for (const row of rows) {
    const domain = (row[DOMAIN_COLUMN] ?? '').trim().toLowerCase();
    if (wanted.size && !wanted.has(domain)) {
      continue;
    }
    const record = buildRecord(options.reportType, row);
    const checks = evaluateAll(registry, record);
    const status = domainStatus(registry, checks);
    if (status === 'skipped') {
      logger.debug({ domain }, 'Domain outside the scored scope');
    }
    results.push({ domain, record, checks, status });
  }

  logger.debug({ rows: rows.length, evaluated: results.length }, 'Evaluated report rows');
  return results;
}

export function diagnoseFile(csvPath: string, options: DiagnoseOptions): DomainResult[] {
  const full = path.resolve(csvPath);
  if (!fs.existsSync(full)) {
    throw new CsvFormatError(`CSV file not found: ${full}`);
  }
  options.logger.debug({ file: full, reportType: options.reportType }, 'Providing diagnostics');
  return diagnoseCsv(fs.readFileSync(full, 'utf-8'), options);
}

/**
 * Exit status for a finished run: indeterminate checks outrank failures,
 * which only count when the caller asked for it.
 */
export function exitCodeFor(results: readonly DomainResult[], failExit: boolean): number {
  const scored = results.filter((result) => result.status !== 'skipped');
  const indeterminate = scored.some((result) =>
    [...result.checks.values()].some((evaluation) => evaluation.result === 'indeterminate'),
  );
  if (indeterminate) return EXIT_INDETERMINATE;
  if (failExit && scored.some((result) => result.status === 'fail')) return EXIT_FAILING;
  return EXIT_OK;
}

export function runDiagnostics(options: RunOptions): RunOutcome {
  const results = diagnoseFile(options.csvPath, options);
  const output = render(options.format, results, {
    reportType: options.reportType,
    includePassing: options.includePassing,
    color: options.color,
  });
  return { output, exitCode: exitCodeFor(results, options.failExit) };
}
