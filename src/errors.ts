export type ErrorCode = 'RULE_DEFINITION' | 'UNKNOWN_REPORT_TYPE' | 'CSV_FORMAT' | 'CONFIG';

export class DiagnosticsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A rule leaf names a field its report type does not have, or tests it the wrong way. */
export class RuleDefinitionError extends DiagnosticsError {
  constructor(message: string) {
    super('RULE_DEFINITION', message);
  }
}

export class UnknownReportTypeError extends DiagnosticsError {
  constructor(reportType: string) {
    super('UNKNOWN_REPORT_TYPE', `Unknown report type: ${reportType}`);
  }
}

export class CsvFormatError extends DiagnosticsError {
  constructor(message: string) {
    super('CSV_FORMAT', message);
  }
}

export class ConfigError extends DiagnosticsError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}
