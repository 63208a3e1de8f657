/**
 * Dev-friendly error mapping for plain-config validation errors
 * Transforms Zod issues into per-field messages with suggestions
 */

import type { ZodError, ZodIssue } from 'zod'

export interface FriendlyError {
  field: string;
  message: string;
  suggestion?: string;
}

const ROOT_FIELD = '(root)';

export function mapValidationError(error: ZodError): FriendlyError[] {
  return error.issues.map(mapSingleIssue);
}

function mapSingleIssue(issue: ZodIssue): FriendlyError {
  const field = issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD;

  switch (issue.code) {
    case 'invalid_type':
      return {
        field,
        message: `Expected ${issue.expected}, received ${issue.received}`,
        suggestion: getTypeSuggestion(field, issue.expected),
      };

    case 'unrecognized_keys':
      return {
        field,
        message: `Unknown option(s): ${issue.keys.join(', ')}`,
        suggestion: 'Remove them, or parse in lenient mode to ignore them',
      };

    case 'too_small':
      if (issue.type === 'array') {
        return { field, message: 'Must contain at least one entry' };
      }
      return { field, message: issue.message };

    case 'custom':
      if (field === 'domainName') {
        return {
          field,
          message: issue.message,
          suggestion: 'Use a registrable domain such as "example.com"',
        };
      }
      return { field, message: issue.message };

    default:
      return { field, message: issue.message };
  }
}

function getTypeSuggestion(field: string, expected: string): string | undefined {
  const root = field.split('.')[0];
  switch (root) {
    case 'blockDevices':
      return 'Provide capacities in GB, e.g. [100, 250]';
    case 'sshKeys':
      return 'Provide numeric SSH key ids, e.g. [12345]';
    case 'inboundPorts':
      return 'Provide port numbers, e.g. [22, 443]';
    default:
      return `Provide a valid ${expected} for ${field}`;
  }
}

/**
 * One line per error, with an indented hint when there is one
 */
export function formatErrors(errors: FriendlyError[]): string {
  const lines: string[] = [];

  for (const error of errors) {
    lines.push(`  - ${error.field}: ${error.message}`);
    if (error.suggestion) {
      lines.push(`    hint: ${error.suggestion}`);
    }
  }

  return lines.join('\n');
}
