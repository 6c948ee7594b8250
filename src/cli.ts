#!/usr/bin/env node
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { describe } from './checks/expr.js';
import { getRegistry, isScored } from './checks/registry.js';
import { REPORT_TYPES } from './checks/types.js';
import type { ReportType } from './checks/types.js';
import { OUTPUT_FORMATS, loadConfig, readLogLevel } from './config.js';
import type { OutputFormat } from './config.js';
import { EXIT_ERROR, runDiagnostics } from './diagnose.js';
import { DiagnosticsError } from './errors.js';
import { createLogger } from './logger.js';

const VERSION = '0.1.0';

const REPORT_DESCRIPTIONS: Record<ReportType, string> = {
  web: 'Explain HTTPS/HSTS check results from a web transport report CSV',
  mail: 'Explain SPF/DMARC/STARTTLS check results from a mail transport report CSV',
};

interface ReportCommandOptions {
  config?: string;
  format?: OutputFormat;
  all?: boolean;
  failExit: boolean;
  debug: boolean;
  color: boolean;
}

const program = new Command();
program.name('report-diagnostics').description('Explain composite verdicts in transport security report CSVs').version(VERSION);

for (const reportType of REPORT_TYPES) {
  program
    .command(reportType)
    .description(REPORT_DESCRIPTIONS[reportType])
    .argument('<csv-file>', 'Report CSV to diagnose')
    .argument('[domains...]', 'Only report these domains')
    .option('--config <file>', 'YAML configuration file')
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS))
    .option('--all', 'Include passing and skipped domains')
    .option('--fail-exit', 'Exit with status 3 when any domain fails', false)
    .option('--debug', 'Print debug output', false)
    .option('--no-color', 'Disable coloured output')
    .action((csvFile: string, domains: string[], cmd: ReportCommandOptions) => {
      const logger = createLogger(cmd.debug ? 'debug' : 'info');
      try {
        const envLevel = readLogLevel(process.env.LOG_LEVEL);
        const config = loadConfig(cmd.config);
        if (!cmd.debug) {
          logger.level = envLevel ?? config.logLevel;
        }
        const { output, exitCode } = runDiagnostics({
          reportType,
          csvPath: csvFile,
          domains: domains.length ? domains : config.domains,
          format: cmd.format ?? config.format,
          includePassing: cmd.all ?? config.includePassing,
          failExit: cmd.failExit,
          color: cmd.color && Boolean(process.stdout.isTTY),
          logger,
        });
        process.stdout.write(output);
        process.exitCode = exitCode;
      } catch (err) {
        if (err instanceof DiagnosticsError) {
          logger.error({ code: err.code, file: csvFile }, err.message);
        } else {
          logger.error(err);
        }
        process.exitCode = EXIT_ERROR;
      }
    });
}

program
  .command('rules')
  .description('List every check and its formula for a report type')
  .addArgument(program.createArgument('<report-type>', 'Report type').choices(REPORT_TYPES))
  .action((reportType: string) => {
    const registry = getRegistry(reportType);
    for (const rule of registry.rules.values()) {
      const role =
        rule.name === registry.verdict
          ? ' (verdict)'
          : rule.name === registry.scope
            ? ' (scope)'
            : isScored(registry, rule.name)
              ? ''
              : ' (helper)';
      console.log(`${chalk.bold(rule.name)}${role}`);
      console.log(`  ${describe(rule.expr)}`);
      if (rule.description) console.log(`  ${chalk.dim(rule.description)}`);
    }
  });

await program.parseAsync(process.argv);
