import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { formatFieldValue } from './checks/record.js';
import { getRegistry, isScored } from './checks/registry.js';
import type { DomainResult, Evaluation, ReportType, Truth } from './checks/types.js';
import type { OutputFormat } from './config.js';
import { tallyMail } from './tally.js';

export interface RenderOptions {
  reportType: ReportType;
  includePassing: boolean;
  color?: boolean;
}

export function formatTruth(value: Truth): string {
  return value === 'indeterminate' ? 'Indeterminate' : value ? 'True' : 'False';
}

function paintTruth(chalk: ChalkInstance, value: Truth): string {
  const text = formatTruth(value);
  if (value === 'indeterminate') return chalk.yellow(text);
  return value ? chalk.green(text) : chalk.red(text);
}

function hasOpenScoredCheck(result: DomainResult): boolean {
  const registry = getRegistry(result.record.reportType);
  return [...result.checks.values()].some(
    (evaluation) => evaluation.result !== true && isScored(registry, evaluation.rule),
  );
}

/** Scored domains with a scored check that is not true; every domain when `includePassing` is set. */
export function selectResults(results: readonly DomainResult[], includePassing: boolean): DomainResult[] {
  if (includePassing) return [...results];
  return results.filter((result) => result.status !== 'skipped' && hasOpenScoredCheck(result));
}

function renderEvaluation(chalk: ChalkInstance, evaluation: Evaluation): string[] {
  const lines = [
    `      ${evaluation.rule} : ${evaluation.formula}`,
    `      = ${paintTruth(chalk, evaluation.result)}`,
  ];
  for (const condition of evaluation.conditions) {
    const marker = condition.cause ? chalk.bold(' <- cause') : '';
    lines.push(
      `        ${condition.id} : ${paintTruth(chalk, condition.value)} (${condition.field} = ${condition.literal})${marker}`,
    );
  }
  return lines;
}

export function renderText(results: readonly DomainResult[], options: RenderOptions): string {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  const selected = selectResults(results, options.includePassing);
  const lines: string[] = [options.includePassing ? 'Domains ::' : 'Domains with Failing Checks ::'];

  if (!selected.length) {
    lines.push('  none');
  }
  for (const result of selected) {
    lines.push(`  ${chalk.bold(result.domain)} [${result.status}]`);
    lines.push('    Values:');
    for (const field of result.record.fields.values()) {
      lines.push(`      ${field.name} : ${formatFieldValue(field)}`);
    }
    lines.push('    Checks:');
    for (const evaluation of result.checks.values()) {
      lines.push(...renderEvaluation(chalk, evaluation));
    }
  }

  if (options.reportType === 'mail') {
    lines.push('');
    for (const [key, count] of Object.entries(tallyMail(results))) {
      lines.push(`${key} :: ${count}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

export function renderJson(results: readonly DomainResult[], options: RenderOptions): string {
  const selected = selectResults(results, options.includePassing);
  const payload = selected.map((result) => ({
    domain: result.domain,
    status: result.status,
    fields: Object.fromEntries([...result.record.fields.values()].map((field) => [field.name, formatFieldValue(field)])),
    checks: Object.fromEntries(
      [...result.checks.values()].map((evaluation) => [
        evaluation.rule,
        { result: evaluation.result, formula: evaluation.formula, conditions: evaluation.conditions },
      ]),
    ),
  }));
  return `${JSON.stringify(payload, null, 2)}\n`;
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderCsv(results: readonly DomainResult[], options: RenderOptions): string {
  const selected = selectResults(results, options.includePassing);
  const first = results[0];
  if (!first) return '';

  const fieldNames = [...first.record.fields.keys()];
  const checks = [...first.checks.values()];
  const header = ['Domain', ...fieldNames, ...checks.map((evaluation) => `${evaluation.rule} - ${evaluation.formula}`)];

  const rows = selected.map((result) => [
    result.domain,
    ...[...result.record.fields.values()].map(formatFieldValue),
    ...[...result.checks.values()].map((evaluation) => formatTruth(evaluation.result)),
  ]);

  return [header, ...rows].map((row) => row.map(csvCell).join(',')).join('\n') + '\n';
}

export function render(format: OutputFormat, results: readonly DomainResult[], options: RenderOptions): string {
  switch (format) {
    case 'json':
      return renderJson(results, options);
    case 'csv':
      return renderCsv(results, options);
    case 'text':
      return renderText(results, options);
  }
}
