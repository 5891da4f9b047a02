/**
 * Issue shapes and the small guards the validators share.
 */

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  /** Dotted location in the document, e.g. `consumers[0].rules[1].priority`. */
  path: string;
  message: string;
  severity: IssueSeverity;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Collects issues in document order; validators never throw on the first
 * problem. An empty path stands for the document root.
 */
export class IssueCollector {
  private readonly issues: ValidationIssue[] = [];

  addError(path: string, message: string): void {
    this.add('error', path, message);
  }

  addWarning(path: string, message: string): void {
    this.add('warning', path, message);
  }

  toResult(): ValidationResult {
    const errors = this.issues.filter((issue) => issue.severity === 'error');
    return {
      valid: errors.length === 0,
      errors,
      warnings: this.issues.filter((issue) => issue.severity === 'warning'),
    };
  }

  private add(severity: IssueSeverity, path: string, message: string): void {
    this.issues.push({ path: path === '' ? '(root)' : path, message, severity });
  }
}

/** Plain object: not null, not an array. */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Own key of a plain object; inherited keys such as `constructor` do not count. */
export function hasProperty(obj: unknown, prop: string): boolean {
  return isObject(obj) && Object.hasOwn(obj, prop);
}

/** Boolean flag as configurations write it: `true`/`false` or the strings `"true"`/`"false"`. */
export function isBooleanFlag(value: unknown): boolean {
  return typeof value === 'boolean' || value === 'true' || value === 'false'
    || value === 'True' || value === 'False';
}

/** First present key among aliases (`id_rule` / `id`). */
export function pickAlias(obj: Record<string, unknown>, keys: readonly string[]): [string, unknown] | undefined {
  const key = keys.find((candidate) => Object.hasOwn(obj, candidate));
  return key === undefined ? undefined : [key, obj[key]];
}
