import type { Condition, Expr, Predicate, Rule } from './types.js';

function quoteField(field: string): string {
  return `'${field}'`;
}

function predicateLabel(field: string, test: Predicate): string {
  const name = quoteField(field);
  switch (test.op) {
    case 'is':
      return test.value ? name : `not ${name}`;
    case 'oneOf':
      return test.values.length === 1
        ? `${name} == "${test.values[0]}"`
        : `${name} in (${test.values.map((v) => `"${v}"`).join(', ')})`;
    case 'atLeast':
      return `${name} >= ${test.value}`;
    case 'equals':
      return `${name} == ${test.value}`;
    case 'contains':
      return `${name} contains "${test.value}"`;
  }
}

function condition<F extends string>(field: F, test: Predicate): Condition<F> {
  const node: Condition<F> = { kind: 'condition', id: predicateLabel(field, test), field, test };
  return Object.freeze(node);
}

export function is<F extends string>(field: F, value = true): Condition<F> {
  return condition(field, { op: 'is', value });
}

export function oneOf<F extends string>(field: F, ...values: string[]): Condition<F> {
  return condition(field, { op: 'oneOf', values: Object.freeze(values.map((v) => v.toLowerCase())) });
}

export function atLeast<F extends string>(field: F, value: number): Condition<F> {
  return condition(field, { op: 'atLeast', value });
}

export function equals<F extends string>(field: F, value: number): Condition<F> {
  return condition(field, { op: 'equals', value });
}

export function contains<F extends string>(field: F, value: string): Condition<F> {
  return condition(field, { op: 'contains', value: value.toLowerCase() });
}

export function and<F extends string>(...children: Expr<F>[]): Expr<F> {
  const node: Expr<F> = { kind: 'and', children: Object.freeze(children) };
  return Object.freeze(node);
}

export function or<F extends string>(...children: Expr<F>[]): Expr<F> {
  const node: Expr<F> = { kind: 'or', children: Object.freeze(children) };
  return Object.freeze(node);
}

export function not<F extends string>(child: Expr<F>): Expr<F> {
  const node: Expr<F> = { kind: 'not', child };
  return Object.freeze(node);
}

/** Embeds a named rule so its name shows up in formulas and traces. */
export function ref<F extends string>(rule: Rule<F>): Expr<F> {
  const node: Expr<F> = { kind: 'rule', rule };
  return Object.freeze(node);
}

export function rule<F extends string>(name: string, expr: Expr<F>, description?: string): Rule<F> {
  const built: Rule<F> = { name, expr, description };
  return Object.freeze(built);
}

/**
 * Builders bound to one report type's field names, so a misspelt column in
 * a rule table fails to compile.
 */
export function fieldBuilders<F extends string>() {
  return {
    is: (field: F, value = true) => is<F>(field, value),
    oneOf: (field: F, ...values: string[]) => oneOf<F>(field, ...values),
    atLeast: (field: F, value: number) => atLeast<F>(field, value),
    equals: (field: F, value: number) => equals<F>(field, value),
    contains: (field: F, value: string) => contains<F>(field, value),
    and: (...children: Expr<F>[]) => and<F>(...children),
    or: (...children: Expr<F>[]) => or<F>(...children),
    not: (child: Expr<F>) => not<F>(child),
    ref: (target: Rule<F>) => ref<F>(target),
    rule: (name: string, expr: Expr<F>, description?: string) => rule<F>(name, expr, description),
  };
}

function describeChild(expr: Expr): string {
  const text = describe(expr);
  return expr.kind === 'and' || expr.kind === 'or' ? `(${text})` : text;
}

/**
 * Renders an expression as the formula printed next to each check, e.g.
 * `'Domain Supports HTTPS' or [HSTS Preload Fallback]`.
 */
export function describe(expr: Expr): string {
  switch (expr.kind) {
    case 'condition':
      return expr.id;
    case 'and':
      return expr.children.map(describeChild).join(' and ');
    case 'or':
      return expr.children.map(describeChild).join(' or ');
    case 'not':
      return `not ${describeChild(expr.child)}`;
    case 'rule':
      return `[${expr.rule.name}]`;
  }
}

/** Every condition reachable from the expression, sub-rules included, in visit order. */
export function conditionsOf<F extends string>(expr: Expr<F>): Condition<F>[] {
  switch (expr.kind) {
    case 'condition':
      return [expr];
    case 'and':
    case 'or':
      return expr.children.flatMap((child) => conditionsOf(child));
    case 'not':
      return conditionsOf(expr.child);
    case 'rule':
      return conditionsOf(expr.rule.expr);
  }
}
