/**
 * Pretty formátter pro CLI výstup - lidsky čitelný formát.
 */

import type { FormattableData, PreviewOutput, ResolveOutput, ValidateOutput } from '../types.js';
import type { OutputFormatter } from './index.js';
import type { ValidationIssue } from '../../validation/types.js';
import { paint, type ColorName } from '../utils/output.js';

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'validation':
        return this.formatValidation(data.data);
      case 'resolution':
        return this.formatResolution(data.data);
      case 'preview':
        return this.formatPreview(data.data);
      case 'error':
        return this.color(`✗ ${data.data}`, 'red');
      case 'message':
        return data.data;
    }
  }

  private formatValidation(output: ValidateOutput): string {
    const lines: string[] = [];

    lines.push(this.color(`File: ${output.file}`, 'bold'));
    lines.push(`Consumers: ${output.consumerCount}`);
    lines.push('');

    if (output.valid && output.warningCount === 0) {
      lines.push(`${this.color('✓', 'green')} Configuration is valid`);
    } else if (output.valid) {
      lines.push(`${this.color('✓', 'green')} Valid with ${output.warningCount} warning(s)`);
    } else {
      lines.push(this.color(`✗ ${output.errorCount} error(s), ${output.warningCount} warning(s)`, 'red'));
    }

    this.pushIssues(lines, 'Errors:', 'red', '✗', output.errors);
    this.pushIssues(lines, 'Warnings:', 'yellow', '⚠', output.warnings);

    return lines.join('\n');
  }

  private pushIssues(
    lines: string[],
    title: string,
    color: ColorName,
    marker: string,
    issues: readonly ValidationIssue[]
  ): void {
    if (issues.length === 0) return;
    lines.push('');
    lines.push(this.color(title, color));
    for (const issue of issues) {
      lines.push(`  ${this.color(marker, color)} ${this.color(issue.path, 'cyan')}: ${issue.message}`);
    }
  }

  private formatResolution(output: ResolveOutput): string {
    const path = this.color(output.path, 'cyan');
    const { result } = output;

    switch (result.status) {
      case 'found':
        return `${this.color('✓', 'green')} ${path} = ${JSON.stringify(result.value, null, 2)}`;
      case 'missing':
        return `${this.color('○', 'yellow')} ${path} not found (first missing segment: ${result.depth})`;
      case 'error':
        return `${this.color('✗', 'red')} ${path}: ${result.error}`;
    }
  }

  private formatPreview(output: PreviewOutput): string {
    const { entity } = output;
    const lines: string[] = [
      this.color(`Event: ${output.file}`, 'bold'),
      '',
      `${this.color('Entities:', 'cyan')}   ${entity.entity_names.join(', ')}`,
      `${this.color('Session:', 'cyan')}    ${entity.session_id}`,
      `${this.color('Correlation:', 'cyan')} ${entity.tidnid ?? this.color('(none)', 'dim')}`,
      `${this.color('Service:', 'cyan')}    ${entity.data.id_service ?? this.color('(none)', 'dim')}`,
      '',
      this.color('Service data:', 'cyan'),
      this.indent(JSON.stringify(entity.data.service, null, 2)),
      '',
      this.color('Rules:', 'cyan')
    ];

    if (output.rules.length === 0) {
      lines.push(`  ${this.color('(none)', 'dim')}`);
    }
    for (const rule of output.rules) {
      const mark = rule.applicable ? this.color('●', 'green') : this.color('○', 'dim');
      const fields = rule.actions.flatMap((action) => Object.keys(action.output ?? {}));
      const written = fields.length > 0 ? ` → ${fields.join(', ')}` : '';
      lines.push(`  ${mark} ${rule.ruleId} ${this.color(`[${rule.priority}]`, 'dim')}${written}`);
    }

    lines.push('');
    lines.push(this.color('Derived fields:', 'cyan'));
    lines.push(this.indent(JSON.stringify(entity.data.rules, null, 2)));

    lines.push('');
    lines.push(this.color('Queries:', 'cyan'));
    if (output.queries.length === 0) {
      lines.push(`  ${this.color('(none)', 'dim')}`);
    }
    for (const query of output.queries) {
      lines.push(`  ${this.color(query.kind, 'magenta')} ${query.entityName}`);
      lines.push(`    ${query.query}`);
      lines.push(`    ${this.color('params:', 'dim')} ${JSON.stringify(query.params)}`);
    }

    return lines.join('\n');
  }

  private indent(text: string): string {
    return text.split('\n').map((line) => `  ${line}`).join('\n');
  }

  private color(text: string, color: ColorName): string {
    return paint(text, color, this.useColors);
  }
}
