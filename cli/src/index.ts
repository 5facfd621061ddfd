#!/usr/bin/env node
/**
 * Sprig command-line interface.
 *
 * Usage:
 *   sprig                          Start the REPL
 *   sprig <file.sprig>             Run a file
 *   sprig run [file.sprig]         Run a file (or the manifest's entry)
 *   sprig --eval "<code>"          Evaluate code and print the result
 *   sprig repl                     Start the REPL
 *   sprig fmt <file.sprig> ...     Format files
 *   sprig lint <file.sprig> ...    Lint files
 *   sprig init [dir] [--name n]    Create a new project
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  Interpreter,
  OutputSink,
  SprigError,
  VERSION,
  startRepl,
  valueToRepr,
} from '../../interpreter/src';
import { formatCommand } from '../../formatter/src';
import { lintCommand } from '../../linter/src';
import { Manifest, findManifest, loadManifest, resolveEntry } from './config';
import { initProject } from './init';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** Host stack exhausted by deep recursion. */
export const EXIT_FATAL = 70;

export interface CliOptions {
  /** Directory to resolve relative paths and find sprig.json from. */
  cwd?: string;
  /** Where `print` writes. Defaults to process.stdout. */
  output?: OutputSink;
}

interface Project {
  manifestPath: string;
  manifest: Manifest;
}

interface RunSettings {
  stdlib: boolean;
  output?: OutputSink;
}

/**
 * Run the CLI. Returns the exit code, or null when an interactive
 * session was started and keeps the process alive.
 */
export function runCli(args: string[], options: CliOptions = {}): number | null {
  try {
    return dispatch(args, options);
  } catch (e) {
    if (e instanceof SprigError) {
      console.error(e.message);
      return EXIT_FAILURE;
    }
    throw e;
  }
}

function dispatch(args: string[], options: CliOptions): number | null {
  const cwd = options.cwd ?? process.cwd();

  // Subcommands with their own option parsing.
  switch (args[0]) {
    case 'fmt':
      return formatCommand(args.slice(1));
    case 'lint':
      return lintCommand(args.slice(1));
    case 'init':
      return init(args.slice(1), cwd);
  }

  const stdlibFlag = args.includes('--stdlib');
  const [command, ...rest] = args.filter(a => a !== '--stdlib');

  const settingsFor = (project: Project | null): RunSettings => ({
    stdlib: stdlibFlag || (project?.manifest.stdlib ?? false),
    output: options.output,
  });

  if (command === undefined || command === 'repl') {
    const project = loadProject(cwd);
    startRepl({ ...settingsFor(project), prompt: project?.manifest.repl?.prompt });
    return null;
  }

  switch (command) {
    case '--help':
    case '-h':
      printUsage();
      return EXIT_OK;

    case '--version':
    case '-v':
      console.log(`sprig ${VERSION}`);
      return EXIT_OK;

    case '--eval':
    case '-e': {
      const code = rest[0];
      if (code === undefined) {
        console.error('Error: --eval requires an argument');
        return EXIT_FAILURE;
      }
      return execute(code, settingsFor(loadProject(cwd)), true);
    }

    case 'run': {
      if (rest[0] !== undefined) {
        return runFile(path.resolve(cwd, rest[0]), settingsFor);
      }
      const project = loadProject(cwd);
      if (project === null) {
        console.error('Error: no file given and no sprig.json found');
        return EXIT_FAILURE;
      }
      return runFile(resolveEntry(project.manifestPath, project.manifest), settingsFor);
    }

    default:
      if (command.startsWith('-')) {
        console.error(`Unknown option: ${command}`);
        printUsage();
        return EXIT_FAILURE;
      }
      return runFile(path.resolve(cwd, command), settingsFor);
  }
}

function loadProject(dir: string): Project | null {
  const manifestPath = findManifest(dir);
  if (manifestPath === null) return null;
  return { manifestPath, manifest: loadManifest(manifestPath) };
}

function runFile(file: string, settingsFor: (project: Project | null) => RunSettings): number {
  if (!fs.existsSync(file)) {
    console.error(`Error: File not found: ${file}`);
    return EXIT_FAILURE;
  }
  const source = fs.readFileSync(file, 'utf-8');
  return execute(source, settingsFor(loadProject(path.dirname(file))), false);
}

/**
 * Evaluate a whole program. Evaluation and read errors exit with 1,
 * stack exhaustion with EXIT_FATAL.
 */
function execute(source: string, settings: RunSettings, showResult: boolean): number {
  const interpreter = new Interpreter(settings);
  try {
    const value = interpreter.run(source);
    if (showResult && value.kind !== 'nil') {
      console.log(valueToRepr(value));
    }
    return EXIT_OK;
  } catch (e) {
    if (e instanceof SprigError) {
      console.error(e.message);
      return EXIT_FAILURE;
    }
    if (e instanceof RangeError) {
      console.error('fatal: maximum call stack size exceeded');
      return EXIT_FATAL;
    }
    throw e;
  }
}

function init(args: string[], cwd: string): number {
  let name: string | undefined;
  let directory: string | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--name') {
      name = args[++i];
      if (name === undefined) {
        console.error('Error: --name requires a value');
        return EXIT_FAILURE;
      }
    } else if (args[i].startsWith('-')) {
      console.error(`Unknown option: ${args[i]}`);
      return EXIT_FAILURE;
    } else {
      directory = args[i];
    }
  }

  initProject({ name, directory, cwd });
  return EXIT_OK;
}

function printUsage(): void {
  console.log(`Sprig v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  sprig                          Start the REPL');
  console.log('  sprig <file.sprig>             Run a file');
  console.log('  sprig run [file.sprig]         Run a file (default: entry in sprig.json)');
  console.log('  sprig --eval "<code>"          Evaluate code and print the result');
  console.log('  sprig repl                     Start the REPL');
  console.log('  sprig fmt <file.sprig> ...     Format files (see sprig fmt --help)');
  console.log('  sprig lint <file.sprig> ...    Lint files (see sprig lint --help)');
  console.log('  sprig init [dir] [--name n]    Create a new project');
  console.log('');
  console.log('Options:');
  console.log('  --stdlib             Load the standard library');
  console.log('  --version, -v        Show the version');
  console.log('  --help, -h           Show this help');
}

if (require.main === module) {
  const code = runCli(process.argv.slice(2));
  if (code !== null) {
    process.exitCode = code;
  }
}
