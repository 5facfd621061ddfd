#!/usr/bin/env node
/**
 * Sprig linter CLI entry point.
 *
 * Usage:
 *   sprig-lint <file.sprig> [...]
 *   sprig-lint --rule unused-binding <file.sprig>
 *   sprig-lint --disable shadowed-builtin <file.sprig>
 */

import * as fs from 'fs';
import * as path from 'path';
import { createDefaultLinter, formatDiagnostic, LintOptions } from './linter';

export {
  Linter,
  LintRule,
  LintOptions,
  Diagnostic,
  Severity,
  createDefaultLinter,
  formatDiagnostic,
} from './linter';

/**
 * Lint the files named on the command line and return the exit code.
 */
export function lintCommand(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    return 0;
  }

  const options: LintOptions = {};
  const files: string[] = [];
  const enabledRules: string[] = [];
  const disabledRules: string[] = [];

  const knownRules = createDefaultLinter().getRuleNames();

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--rule':
      case '--disable': {
        const flag = args[i];
        const name = args[++i];
        if (name === undefined || name.startsWith('-')) {
          console.error(`Error: ${flag} requires a rule name`);
          return 1;
        }
        if (!knownRules.includes(name)) {
          console.error(`Unknown rule: ${name}. Use --list-rules to see available rules.`);
          return 1;
        }
        (flag === '--rule' ? enabledRules : disabledRules).push(name);
        break;
      }
      case '--list-rules':
        console.log('Available rules:');
        for (const name of knownRules) {
          console.log(`  ${name}`);
        }
        return 0;
      default:
        if (args[i].startsWith('-')) {
          console.error(`Unknown option: ${args[i]}`);
          return 1;
        }
        files.push(args[i]);
        break;
    }
  }

  if (enabledRules.length > 0) options.enabledRules = enabledRules;
  if (disabledRules.length > 0) options.disabledRules = disabledRules;

  if (files.length === 0) {
    console.error('Error: no files specified');
    return 1;
  }

  const linter = createDefaultLinter();
  let totalDiagnostics = 0;
  let totalErrors = 0;

  for (const file of files) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      return 1;
    }

    const source = fs.readFileSync(resolved, 'utf-8');
    const diagnostics = linter.lint(source, options);
    totalDiagnostics += diagnostics.length;
    totalErrors += diagnostics.filter(d => d.severity === 'error').length;

    if (diagnostics.length > 0) {
      console.log(`${file}:`);
      for (const d of diagnostics) {
        console.log(formatDiagnostic(d, file));
      }
      console.log('');
    }
  }

  const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? '' : 's'}`;

  if (totalDiagnostics === 0) {
    console.log(`All clean! ${plural(files.length, 'file')} checked.`);
  } else {
    const warnings = totalDiagnostics - totalErrors;
    const parts: string[] = [];
    if (totalErrors > 0) parts.push(plural(totalErrors, 'error'));
    if (warnings > 0) parts.push(plural(warnings, 'warning'));
    console.log(`Found ${parts.join(' and ')} in ${plural(files.length, 'file')}.`);
  }

  return totalErrors > 0 ? 1 : 0;
}

function printUsage(): void {
  console.log('Sprig Linter v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sprig lint <file.sprig> [...]              Lint files');
  console.log('  sprig lint --rule <name> <file.sprig>       Run only specific rule(s)');
  console.log('  sprig lint --disable <name> <file.sprig>    Disable specific rule(s)');
  console.log('  sprig lint --list-rules                     List available rules');
  console.log('');
  console.log('Rules:');
  console.log('  special-form-shape       Detect malformed if, let and lambda forms');
  console.log('  unused-binding           Detect bindings and parameters that are never used');
  console.log('  undefined-identifier     Detect references to names that are never bound');
  console.log('  shadowed-builtin         Warn when a binding reuses a builtin name');
}

if (require.main === module) {
  process.exit(lintCommand(process.argv.slice(2)));
}
