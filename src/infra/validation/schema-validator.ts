import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import type { ErrorObject } from 'ajv';

export interface ValidationIssue {
  path: string;
  message: string;
}

export function createValidator(): Ajv2020 {
  const ajv = new Ajv2020({ allErrors: true, strict: false });
  addFormats(ajv);
  return ajv;
}

function formatErrorPath(error: ErrorObject): string {
  const instancePath = error.instancePath ?? '';
  const params: Record<string, unknown> = error.params;

  if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    return `${instancePath}/${params.additionalProperty}`;
  }

  if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
    return `${instancePath}/${params.missingProperty}`;
  }

  return instancePath || '/';
}

export function toValidationIssues(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors || []).map((err) => ({
    path: formatErrorPath(err),
    message: err.message || 'Unknown validation error',
  }));
}

export function describeIssues(issues: ValidationIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}
