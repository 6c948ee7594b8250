import { RuleDefinitionError, UnknownReportTypeError } from '../errors.js';
import { conditionsOf } from './expr.js';
import { fieldCatalog } from './fields.js';
import { MAIL_RULES, domainInScope, mailCompliance } from './mail.js';
import type { FieldKind, FieldSpec, Predicate, RegistryRoles, ReportType, Rule, RuleRegistry } from './types.js';
import { WEB_RULES, hstsPreloadFallback, webCompliance } from './web.js';

const PREDICATE_KINDS: Record<Predicate['op'], FieldKind> = {
  is: 'boolean',
  oneOf: 'enum',
  atLeast: 'integer',
  equals: 'integer',
  contains: 'list',
};

function validateRule(reportType: ReportType, rule: Rule, fields: ReadonlyMap<string, FieldSpec>): void {
  for (const condition of conditionsOf(rule.expr)) {
    const spec = fields.get(condition.field);
    if (!spec) {
      throw new RuleDefinitionError(
        `Rule "${rule.name}" references field "${condition.field}" that ${reportType} reports do not have`,
      );
    }
    const expected = PREDICATE_KINDS[condition.test.op];
    if (spec.kind !== expected) {
      throw new RuleDefinitionError(
        `Rule "${rule.name}" applies "${condition.test.op}" to ${spec.kind} field "${condition.field}"`,
      );
    }
    if (condition.test.op === 'oneOf' && spec.kind === 'enum') {
      const allowed = spec.values;
      const unknown = condition.test.values.filter((value) => !allowed.includes(value));
      if (unknown.length) {
        throw new RuleDefinitionError(
          `Rule "${rule.name}" tests "${condition.field}" for unknown values: ${unknown.join(', ')}`,
        );
      }
    }
  }
}

/** Validates every rule against the field catalog of its report type and freezes the result. */
export function createRegistry(reportType: ReportType, rules: readonly Rule[], roles: RegistryRoles): RuleRegistry {
  const fields = fieldCatalog(reportType);
  const byName = new Map<string, Rule>();
  for (const rule of rules) {
    if (byName.has(rule.name)) {
      throw new RuleDefinitionError(`Duplicate ${reportType} rule name "${rule.name}"`);
    }
    validateRule(reportType, rule, fields);
    byName.set(rule.name, rule);
  }
  const helpers = Object.freeze([...(roles.helpers ?? [])]);
  for (const name of [roles.verdict, roles.scope, ...helpers]) {
    if (name !== undefined && !byName.has(name)) {
      throw new RuleDefinitionError(`Registry role names unknown ${reportType} rule "${name}"`);
    }
  }
  if (helpers.includes(roles.verdict)) {
    throw new RuleDefinitionError(`Verdict check "${roles.verdict}" cannot be a helper`);
  }
  return Object.freeze({ reportType, fields, rules: byName, verdict: roles.verdict, scope: roles.scope, helpers });
}

/** Whether a check counts towards a domain's listing, as opposed to being a building block. */
export function isScored(registry: RuleRegistry, checkName: string): boolean {
  return !registry.helpers.includes(checkName);
}

export function isReportType(value: string): value is ReportType {
  return value === 'web' || value === 'mail';
}

export function buildRegistry(reportType: string): RuleRegistry {
  if (!isReportType(reportType)) throw new UnknownReportTypeError(reportType);
  return reportType === 'web'
    ? createRegistry('web', WEB_RULES, { verdict: webCompliance.name, helpers: [hstsPreloadFallback.name] })
    : createRegistry('mail', MAIL_RULES, { verdict: mailCompliance.name, scope: domainInScope.name });
}

const registries = new Map<ReportType, RuleRegistry>();

/** Process-wide registry for a report type, built and validated on first use. */
export function getRegistry(reportType: string): RuleRegistry {
  if (!isReportType(reportType)) throw new UnknownReportTypeError(reportType);
  let registry = registries.get(reportType);
  if (!registry) {
    registry = buildRegistry(reportType);
    registries.set(reportType, registry);
  }
  return registry;
}
