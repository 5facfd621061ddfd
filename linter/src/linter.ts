/**
 * Sprig linter engine.
 *
 * Reads the source into syntax trees and runs a set of lint rules over
 * them, collecting diagnostics (warnings and errors).
 */

import { Expression, LexError, ParseError, parse } from '../../interpreter/src';
import { specialFormShapeRule } from './rules/special-form-shape';
import { unusedBindingRule } from './rules/unused-binding';
import { undefinedIdentifierRule } from './rules/undefined-identifier';
import { shadowedBuiltinRule } from './rules/shadowed-builtin';

export type Severity = 'error' | 'warning' | 'info';

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  /** 1-based */
  line: number;
  /** 0-based */
  column: number;
}

/**
 * A lint rule receives the parsed program and reports diagnostics.
 */
export interface LintRule {
  /** Unique rule identifier (e.g., "unused-binding") */
  name: string;
  /** Human-readable description */
  description: string;
  /** Default severity */
  severity: Severity;
  /** Run the rule and return diagnostics */
  run(program: Expression[], source: string): Diagnostic[];
}

export interface LintOptions {
  /** Rules to enable (by name). If empty/undefined, all rules run. */
  enabledRules?: string[];
  /** Rules to disable (by name). */
  disabledRules?: string[];
}

/**
 * The main linter class. Register rules, then lint source code.
 */
export class Linter {
  private rules: LintRule[] = [];

  /**
   * Register a lint rule.
   */
  addRule(rule: LintRule): void {
    this.rules.push(rule);
  }

  /**
   * Lint Sprig source code. Returns diagnostics sorted by line.
   *
   * Source that cannot be read yields a single `syntax` diagnostic and
   * no rule runs.
   */
  lint(source: string, options?: LintOptions): Diagnostic[] {
    let program: Expression[];
    try {
      program = parse(source);
    } catch (e) {
      if (e instanceof LexError || e instanceof ParseError) {
        return [{ rule: 'syntax', severity: 'error', message: e.reason, line: e.line, column: e.column }];
      }
      throw e;
    }

    const enabledRules = options?.enabledRules;
    const disabledRules = new Set(options?.disabledRules ?? []);

    const diagnostics: Diagnostic[] = [];

    for (const rule of this.rules) {
      if (disabledRules.has(rule.name)) continue;
      if (enabledRules && enabledRules.length > 0 && !enabledRules.includes(rule.name)) continue;

      try {
        diagnostics.push(...rule.run(program, source));
      } catch (e) {
        diagnostics.push({
          rule: rule.name,
          severity: 'error',
          message: `Rule failed internally: ${e instanceof Error ? e.message : String(e)}`,
          line: 0,
          column: 0,
        });
      }
    }

    // Sort by line, then column
    diagnostics.sort((a, b) => a.line - b.line || a.column - b.column);

    return diagnostics;
  }

  /**
   * Get all registered rule names.
   */
  getRuleNames(): string[] {
    return this.rules.map(r => r.name);
  }
}

/**
 * Format a diagnostic for terminal output.
 */
export function formatDiagnostic(d: Diagnostic, filename?: string): string {
  const loc = filename
    ? `${filename}:${d.line}:${d.column}`
    : `${d.line}:${d.column}`;
  const tag = d.severity === 'error' ? 'error' : d.severity === 'warning' ? 'warn' : 'info';
  return `  ${loc}  ${tag}  ${d.message}  (${d.rule})`;
}

/**
 * Create a linter with all built-in rules registered.
 */
export function createDefaultLinter(): Linter {
  const linter = new Linter();
  linter.addRule(specialFormShapeRule);
  linter.addRule(unusedBindingRule);
  linter.addRule(undefinedIdentifierRule);
  linter.addRule(shadowedBuiltinRule);
  return linter;
}
