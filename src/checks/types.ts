export type ReportType = 'web' | 'mail';

export const REPORT_TYPES: readonly ReportType[] = ['web', 'mail'];

/** Three-valued truth: a check that reads an unparseable field cannot be decided. */
export type Truth = boolean | 'indeterminate';

export type FieldSpec =
  | { kind: 'boolean' }
  | { kind: 'enum'; values: readonly string[] }
  | { kind: 'integer' }
  | { kind: 'list' };

export type FieldKind = FieldSpec['kind'];

export type UnparseableReason = 'missing' | 'empty' | 'unrecognized';

export type FieldValue =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'enum'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'list'; value: readonly string[] }
  | { kind: 'unparseable'; reason: UnparseableReason };

export interface Field {
  name: string;
  /** Cell text as read, or undefined when the column was absent. */
  raw?: string;
  value: FieldValue;
}

export interface ReportRecord<F extends string = string> {
  reportType: ReportType;
  domain: string;
  fields: ReadonlyMap<F, Field>;
}

export type Predicate =
  | { op: 'is'; value: boolean }
  | { op: 'oneOf'; values: readonly string[] }
  | { op: 'atLeast'; value: number }
  | { op: 'equals'; value: number }
  | { op: 'contains'; value: string };

export interface Condition<F extends string = string> {
  kind: 'condition';
  id: string;
  field: F;
  test: Predicate;
}

export type Expr<F extends string = string> =
  | Condition<F>
  | { kind: 'and'; children: readonly Expr<F>[] }
  | { kind: 'or'; children: readonly Expr<F>[] }
  | { kind: 'not'; child: Expr<F> }
  | { kind: 'rule'; rule: Rule<F> };

export interface Rule<F extends string = string> {
  name: string;
  description?: string;
  expr: Expr<F>;
}

export interface ConditionOutcome {
  id: string;
  field: string;
  value: Truth;
  /** Field value as read from the row, rendered as text. */
  literal: string;
  unparseable: boolean;
  cause: boolean;
}

export type TraceNode =
  | { kind: 'condition'; id: string; value: Truth }
  | { kind: 'and' | 'or'; value: Truth; children: readonly TraceNode[] }
  | { kind: 'not'; value: Truth; child: TraceNode }
  | { kind: 'rule'; name: string; value: Truth; child: TraceNode };

export interface Evaluation {
  rule: string;
  formula: string;
  result: Truth;
  conditions: readonly ConditionOutcome[];
  trace: TraceNode;
}

export interface RuleRegistry<F extends string = string> {
  reportType: ReportType;
  fields: ReadonlyMap<F, FieldSpec>;
  rules: ReadonlyMap<string, Rule<F>>;
  /** Check whose result is the domain's overall verdict. */
  verdict: string;
  /** Check that decides whether the domain is scored at all. */
  scope?: string;
  /** Building blocks other checks reference; evaluated and explained, never scored on their own. */
  helpers: readonly string[];
}

export interface RegistryRoles {
  verdict: string;
  scope?: string;
  helpers?: readonly string[];
}

export type DomainStatus = 'pass' | 'fail' | 'indeterminate' | 'skipped';

export interface DomainResult {
  domain: string;
  record: ReportRecord;
  status: DomainStatus;
  checks: ReadonlyMap<string, Evaluation>;
}
