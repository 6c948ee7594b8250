import { RuleDefinitionError } from '../errors.js';
import { describe } from './expr.js';
import { formatFieldValue, isUnparseable } from './record.js';
import type {
  Condition,
  ConditionOutcome,
  DomainStatus,
  Evaluation,
  Expr,
  Field,
  ReportRecord,
  Rule,
  RuleRegistry,
  TraceNode,
  Truth,
} from './types.js';

export function andTruth(values: readonly Truth[]): Truth {
  if (values.includes(false)) return false;
  if (values.includes('indeterminate')) return 'indeterminate';
  return true;
}

export function orTruth(values: readonly Truth[]): Truth {
  if (values.includes(true)) return true;
  if (values.includes('indeterminate')) return 'indeterminate';
  return false;
}

export function notTruth(value: Truth): Truth {
  return value === 'indeterminate' ? value : !value;
}

function kindMismatch(condition: Condition, field: Field): RuleDefinitionError {
  return new RuleDefinitionError(
    `Condition ${condition.id} cannot apply "${condition.test.op}" to ${field.value.kind} field "${field.name}"`,
  );
}

export function testCondition(condition: Condition, field: Field): Truth {
  const { value } = field;
  if (value.kind === 'unparseable') return 'indeterminate';

  const { test } = condition;
  switch (test.op) {
    case 'is':
      if (value.kind !== 'boolean') throw kindMismatch(condition, field);
      return value.value === test.value;
    case 'oneOf':
      if (value.kind !== 'enum') throw kindMismatch(condition, field);
      return test.values.includes(value.value);
    case 'atLeast':
      if (value.kind !== 'integer') throw kindMismatch(condition, field);
      return value.value >= test.value;
    case 'equals':
      if (value.kind !== 'integer') throw kindMismatch(condition, field);
      return value.value === test.value;
    case 'contains':
      if (value.kind !== 'list') throw kindMismatch(condition, field);
      return value.value.includes(test.value);
  }
}

interface Walk {
  rule: Rule;
  record: ReportRecord;
  outcomes: Map<string, Omit<ConditionOutcome, 'cause'>>;
}

// Every child is visited even when a sibling already decides the node,
// so the condition list covers the whole tree.
function walk(expr: Expr, state: Walk): TraceNode {
  switch (expr.kind) {
    case 'condition': {
      const field = state.record.fields.get(expr.field);
      if (!field) {
        throw new RuleDefinitionError(
          `Rule "${state.rule.name}" references field "${expr.field}" missing from ${state.record.reportType} records`,
        );
      }
      const value = testCondition(expr, field);
      if (!state.outcomes.has(expr.id)) {
        state.outcomes.set(expr.id, {
          id: expr.id,
          field: expr.field,
          value,
          literal: formatFieldValue(field),
          unparseable: isUnparseable(field),
        });
      }
      const node: TraceNode = { kind: 'condition', id: expr.id, value };
      return Object.freeze(node);
    }
    case 'and':
    case 'or': {
      const children = Object.freeze(expr.children.map((child) => walk(child, state)));
      const values = children.map((child) => child.value);
      const node: TraceNode = {
        kind: expr.kind,
        value: expr.kind === 'and' ? andTruth(values) : orTruth(values),
        children,
      };
      return Object.freeze(node);
    }
    case 'not': {
      const child = walk(expr.child, state);
      const node: TraceNode = { kind: 'not', value: notTruth(child.value), child };
      return Object.freeze(node);
    }
    case 'rule': {
      const child = walk(expr.rule.expr, state);
      const node: TraceNode = { kind: 'rule', name: expr.rule.name, value: child.value, child };
      return Object.freeze(node);
    }
  }
}

/**
 * Conditions that decide a node: the children that share the node's value.
 * For a false AND those are its false children, for a false OR all of them,
 * for an indeterminate node its indeterminate children.
 */
function collectCauses(node: TraceNode, into: Set<string>): void {
  switch (node.kind) {
    case 'condition':
      into.add(node.id);
      return;
    case 'not':
    case 'rule':
      collectCauses(node.child, into);
      return;
    case 'and':
    case 'or':
      for (const child of node.children) {
        if (child.value === node.value) collectCauses(child, into);
      }
  }
}

export function evaluate(rule: Rule, record: ReportRecord): Evaluation {
  const state: Walk = { rule, record, outcomes: new Map() };
  const trace = walk(rule.expr, state);

  const causes = new Set<string>();
  if (trace.value !== true) collectCauses(trace, causes);

  const conditions = [...state.outcomes.values()].map((outcome) =>
    Object.freeze({ ...outcome, cause: causes.has(outcome.id) }),
  );

  return Object.freeze({
    rule: rule.name,
    formula: describe(rule.expr),
    result: trace.value,
    conditions: Object.freeze(conditions),
    trace,
  });
}

/** Runs every check of the registry against the record, in registry order. */
export function evaluateAll(registry: RuleRegistry, record: ReportRecord): ReadonlyMap<string, Evaluation> {
  if (registry.reportType !== record.reportType) {
    throw new RuleDefinitionError(
      `Cannot evaluate a ${record.reportType} record against the ${registry.reportType} rule registry`,
    );
  }
  const results = new Map<string, Evaluation>();
  for (const [name, rule] of registry.rules) {
    results.set(name, evaluate(rule, record));
  }
  return results;
}

/**
 * Overall status of one domain: skipped when the scope check says it is not
 * scored, otherwise the verdict check's result.
 */
export function domainStatus(registry: RuleRegistry, checks: ReadonlyMap<string, Evaluation>): DomainStatus {
  const toStatus = (value: Truth): DomainStatus =>
    value === 'indeterminate' ? 'indeterminate' : value ? 'pass' : 'fail';

  if (registry.scope !== undefined) {
    const scope = checks.get(registry.scope);
    if (scope?.result === false) return 'skipped';
    if (scope?.result === 'indeterminate') return 'indeterminate';
  }
  const verdict = checks.get(registry.verdict);
  if (!verdict) {
    throw new RuleDefinitionError(`Verdict check "${registry.verdict}" was not evaluated`);
  }
  return toStatus(verdict.result);
}
