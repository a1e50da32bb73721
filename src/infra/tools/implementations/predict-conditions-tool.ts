import type { ToolDefinition } from '../tool-registry.js';
import type { ToolParametersSchema } from '../../../domain/tools/types.js';
import { createValidator, describeIssues, toValidationIssues } from '../../validation/schema-validator.js';
import bundledRules from './data/condition-rules.json';

export type SeverityClass = 'HIGH' | 'MODERATE' | 'MILD';
export type DurationClass = 'PROLONGED' | 'MODERATE' | 'ACUTE';

export interface ConditionInfo {
  id: string;
  condition: string;
  probability: string;
  risk: string;
  reasoning: string;
  tests: string;
  actions: string[];
}

export interface ConditionRule extends ConditionInfo {
  match: {
    /** Every term must appear */
    all?: string[];
    /** Each group needs at least one of its terms */
    anyOf?: string[][];
    /** No term may appear */
    none?: string[];
    severity?: SeverityClass;
    /** Match against the additional info as well as the symptoms */
    includeAdditionalInfo?: boolean;
  };
}

export interface ConditionRuleSet {
  severity: { high: string[]; moderate: string[] };
  duration: { prolonged: string[]; moderate: string[] };
  maxConditions: number;
  conditions: ConditionRule[];
  fallback: ConditionInfo;
  emergencySigns: string[];
  disclaimer: string;
}

interface PredictConditionsArgs {
  symptoms: string;
  duration: string;
  severity: string;
  additional_info?: string;
}

export interface ConditionAssessment {
  symptoms: string;
  duration: { reported: string; class: DurationClass };
  severity: { reported: string; class: SeverityClass };
  additionalInfo?: string;
  conditions: Array<Omit<ConditionInfo, 'id'>>;
  seeDoctorAfterDays: number;
  emergencySigns: string[];
  disclaimer: string;
}

const termList = { type: 'array', items: { type: 'string', minLength: 1 } } as const;

const conditionInfoProperties = {
  id: { type: 'string', minLength: 1 },
  condition: { type: 'string', minLength: 1 },
  probability: { type: 'string' },
  risk: { type: 'string' },
  reasoning: { type: 'string' },
  tests: { type: 'string' },
  actions: { type: 'array', items: { type: 'string' } },
} as const;

const conditionInfoRequired = ['id', 'condition', 'probability', 'risk', 'reasoning', 'tests', 'actions'];

const RULE_SET_SCHEMA = {
  type: 'object',
  required: ['severity', 'duration', 'maxConditions', 'conditions', 'fallback', 'emergencySigns', 'disclaimer'],
  properties: {
    severity: {
      type: 'object',
      required: ['high', 'moderate'],
      properties: { high: termList, moderate: termList },
    },
    duration: {
      type: 'object',
      required: ['prolonged', 'moderate'],
      properties: { prolonged: termList, moderate: termList },
    },
    maxConditions: { type: 'integer', minimum: 1 },
    conditions: {
      type: 'array',
      items: {
        type: 'object',
        required: [...conditionInfoRequired, 'match'],
        properties: {
          ...conditionInfoProperties,
          match: {
            type: 'object',
            properties: {
              all: termList,
              anyOf: { type: 'array', items: termList },
              none: termList,
              severity: { enum: ['HIGH', 'MODERATE', 'MILD'] },
              includeAdditionalInfo: { type: 'boolean' },
            },
            additionalProperties: false,
          },
        },
      },
    },
    fallback: {
      type: 'object',
      required: conditionInfoRequired,
      properties: conditionInfoProperties,
    },
    emergencySigns: { type: 'array', items: { type: 'string' } },
    disclaimer: { type: 'string', minLength: 1 },
  },
};

export function loadConditionRules(raw: unknown = bundledRules): ConditionRuleSet {
  const validate = createValidator().compile<ConditionRuleSet>(RULE_SET_SCHEMA);
  if (!validate(raw)) {
    throw new Error(`Invalid condition rules: ${describeIssues(toValidationIssues(validate.errors))}`);
  }
  return raw;
}

function containsAny(text: string, terms: readonly string[]): boolean {
  return terms.some((term) => text.includes(term.toLowerCase()));
}

export function classifySeverity(severity: string, rules: ConditionRuleSet): SeverityClass {
  const text = severity.toLowerCase();
  if (containsAny(text, rules.severity.high)) return 'HIGH';
  if (containsAny(text, rules.severity.moderate)) return 'MODERATE';
  return 'MILD';
}

export function classifyDuration(duration: string, rules: ConditionRuleSet): DurationClass {
  const text = duration.toLowerCase();
  if (containsAny(text, rules.duration.prolonged)) return 'PROLONGED';
  if (containsAny(text, rules.duration.moderate)) return 'MODERATE';
  return 'ACUTE';
}

function matchesRule(rule: ConditionRule, symptoms: string, additionalInfo: string, severity: SeverityClass): boolean {
  const { match } = rule;
  const text = match.includeAdditionalInfo ? `${symptoms}\n${additionalInfo}` : symptoms;

  if (match.severity && match.severity !== severity) return false;
  if (match.all && !match.all.every((term) => text.includes(term.toLowerCase()))) return false;
  if (match.anyOf && !match.anyOf.every((group) => containsAny(text, group))) return false;
  if (match.none && containsAny(text, match.none)) return false;
  return true;
}

export function assessConditions(args: PredictConditionsArgs, rules: ConditionRuleSet): ConditionAssessment {
  const severityClass = classifySeverity(args.severity, rules);
  const durationClass = classifyDuration(args.duration, rules);
  const symptoms = args.symptoms.toLowerCase();
  const additionalInfo = (args.additional_info ?? '').toLowerCase();

  const matched = rules.conditions.filter((rule) => matchesRule(rule, symptoms, additionalInfo, severityClass));
  const selected = matched.length > 0 ? matched.slice(0, rules.maxConditions) : [rules.fallback];

  return {
    symptoms: args.symptoms,
    duration: { reported: args.duration, class: durationClass },
    severity: { reported: args.severity, class: severityClass },
    ...(args.additional_info ? { additionalInfo: args.additional_info } : {}),
    conditions: selected.map(({ condition, probability, risk, reasoning, tests, actions }) => ({
      condition,
      probability,
      risk,
      reasoning,
      tests,
      actions: [...actions],
    })),
    seeDoctorAfterDays: durationClass === 'ACUTE' ? 3 : 1,
    emergencySigns: [...rules.emergencySigns],
    disclaimer: rules.disclaimer,
  };
}

const PARAMETERS: ToolParametersSchema = {
  type: 'object',
  properties: {
    symptoms: { type: 'string', minLength: 1, description: 'Symptoms in the user\'s words, e.g. "fever, body ache"' },
    duration: { type: 'string', minLength: 1, description: 'How long the symptoms have lasted, e.g. "3 days"' },
    severity: { type: 'string', minLength: 1, description: 'Severity in words or on a 1-10 scale' },
    additional_info: { type: 'string', description: 'Other relevant context: recent meals, travel, contacts' },
  },
  required: ['symptoms', 'duration', 'severity'],
  additionalProperties: false,
};

export class PredictConditionsTool implements ToolDefinition<PredictConditionsArgs, ConditionAssessment> {
  name = 'predict_conditions';
  description =
    'Rule-based assessment of possible conditions from symptoms, duration and severity. ' +
    'Returns likely conditions with recommended tests and actions. Not a diagnosis.';
  parameters = PARAMETERS;

  constructor(private readonly rules: ConditionRuleSet = loadConditionRules()) {}

  async execute(args: PredictConditionsArgs): Promise<ConditionAssessment> {
    return assessConditions(args, this.rules);
  }
}
