#!/usr/bin/env node
/**
 * Sprig formatter CLI entry point.
 *
 * Usage:
 *   sprig-fmt <file.sprig>                Format a file in-place
 *   sprig-fmt <file.sprig> --check        Check if file is formatted (exit 1 if not)
 *   sprig-fmt <file.sprig> --stdout       Print formatted output to stdout
 *   sprig-fmt --indent 4 <file.sprig>     Use 4-space body indentation
 */

import * as fs from 'fs';
import * as path from 'path';
import { format, FormatOptions } from './formatter';

export { format, FormatOptions, DEFAULT_OPTIONS } from './formatter';

/**
 * Run the formatter over command-line arguments and return the exit code.
 */
export function formatCommand(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    return 0;
  }

  let check = false;
  let toStdout = false;
  const options: Partial<FormatOptions> = {};
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--check':
        check = true;
        break;
      case '--stdout':
        toStdout = true;
        break;
      case '--indent': {
        const n = parseInt(args[++i], 10);
        if (isNaN(n) || n < 1 || n > 8) {
          console.error('Error: --indent must be a number between 1 and 8');
          return 1;
        }
        options.indentSize = n;
        break;
      }
      case '--max-width': {
        const n = parseInt(args[++i], 10);
        if (isNaN(n) || n < 40) {
          console.error('Error: --max-width must be at least 40');
          return 1;
        }
        options.maxLineWidth = n;
        break;
      }
      default:
        if (args[i].startsWith('-')) {
          console.error(`Unknown option: ${args[i]}`);
          return 1;
        }
        files.push(args[i]);
        break;
    }
  }

  if (files.length === 0) {
    console.error('Error: no files specified');
    return 1;
  }

  let allFormatted = true;

  for (const file of files) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      return 1;
    }

    const source = fs.readFileSync(resolved, 'utf-8');

    let formatted: string;
    try {
      formatted = format(source, options);
    } catch (e) {
      console.error(`Error formatting ${file}: ${e instanceof Error ? e.message : String(e)}`);
      return 1;
    }

    if (check) {
      if (source !== formatted) {
        console.log(`Would reformat: ${file}`);
        allFormatted = false;
      } else {
        console.log(`Already formatted: ${file}`);
      }
    } else if (toStdout) {
      process.stdout.write(formatted);
    } else if (source !== formatted) {
      fs.writeFileSync(resolved, formatted, 'utf-8');
      console.log(`Formatted: ${file}`);
    } else {
      console.log(`Unchanged: ${file}`);
    }
  }

  return check && !allFormatted ? 1 : 0;
}

function printUsage(): void {
  console.log('Sprig Formatter v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sprig fmt <file.sprig> [options]');
  console.log('');
  console.log('Options:');
  console.log('  --check              Check if files are formatted (exit 1 if not)');
  console.log('  --stdout             Print formatted output to stdout');
  console.log('  --indent <n>         Lambda body indentation (default: 2)');
  console.log('  --max-width <n>      Max line width (default: 80)');
  console.log('  --help, -h           Show this help');
}

if (require.main === module) {
  process.exit(formatCommand(process.argv.slice(2)));
}
