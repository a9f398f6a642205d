/**
 * Issue Translator
 *
 * Turns zod issues into localized messages using a LocaleTable.
 */

import type { ZodIssueOptionalMessage } from 'zod';
import type { LocaleTable } from './types';

interface MessageRef {
  key: string;
  param?: string;
}

const FALLBACK: MessageRef = { key: 'fallback' };

/**
 * Pick the locale message for an issue
 */
function messageFor(issue: ZodIssueOptionalMessage): MessageRef {
  switch (issue.code) {
    case 'invalid_type':
      if (issue.received === 'undefined') {
        return { key: 'required' };
      }
      if (issue.expected === 'integer') {
        return { key: 'integer' };
      }
      return { key: 'invalid_type', param: issue.expected };

    case 'invalid_string':
      if (typeof issue.validation !== 'string') {
        return FALLBACK;
      }
      switch (issue.validation) {
        case 'email':
        case 'url':
        case 'uuid':
        case 'datetime':
        case 'date':
        case 'regex':
          return { key: issue.validation };
        default:
          return FALLBACK;
      }

    case 'too_small': {
      const minimum = String(issue.minimum);
      switch (issue.type) {
        case 'string':
          if (issue.exact === true) {
            return { key: 'string_length', param: minimum };
          }
          return issue.minimum === 1 ? { key: 'required' } : { key: 'string_min', param: minimum };
        case 'number':
        case 'bigint':
          return { key: issue.inclusive ? 'number_min' : 'number_gt', param: minimum };
        case 'array':
        case 'set':
          return { key: 'array_min', param: minimum };
        default:
          return FALLBACK;
      }
    }

    case 'too_big': {
      const maximum = String(issue.maximum);
      switch (issue.type) {
        case 'string':
          if (issue.exact === true) {
            return { key: 'string_length', param: maximum };
          }
          return { key: 'string_max', param: maximum };
        case 'number':
        case 'bigint':
          return { key: issue.inclusive ? 'number_max' : 'number_lt', param: maximum };
        case 'array':
        case 'set':
          return { key: 'array_max', param: maximum };
        default:
          return FALLBACK;
      }
    }

    case 'invalid_enum_value':
      return { key: 'enum', param: issue.options.join(' ') };

    case 'invalid_literal':
      return { key: 'literal', param: JSON.stringify(issue.expected) };

    case 'unrecognized_keys':
      return { key: 'unrecognized_keys', param: issue.keys.join(', ') };

    default:
      return FALLBACK;
  }
}

/**
 * Replace `{n}` placeholders with positional arguments
 */
export function fillTemplate(template: string, ...args: string[]): string {
  return template.replace(/\{(\d+)\}/g, (match, index: string) => args[Number(index)] ?? match);
}

export class Translator {
  constructor(private readonly locale: LocaleTable) {}

  get summary(): string {
    return this.locale.summary;
  }

  get rootField(): string {
    return this.locale.rootField;
  }

  translate(issue: ZodIssueOptionalMessage, field: string): string {
    const ref = messageFor(issue);
    const template = this.locale.messages[ref.key] ?? this.locale.messages.fallback ?? '{0}';
    return fillTemplate(template, field, ref.param ?? '');
  }
}
