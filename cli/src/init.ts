/**
 * `sprig init`: project scaffolding.
 *
 * Creates a new Sprig project with:
 *   - sprig.json (project manifest)
 *   - src/main.sprig (entry point)
 *   - tests/main_test.sprig
 *   - .gitignore
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError, MANIFEST_FILE, PROJECT_NAME_PATTERN } from './config';

export interface InitOptions {
  /** Project name (defaults to directory name) */
  name?: string;
  /** Target directory (defaults to cwd) */
  directory?: string;
  /** Base for a relative `directory` (defaults to process.cwd()) */
  cwd?: string;
}

/**
 * Initialize a new Sprig project. Throws ConfigError when the name is
 * invalid or the directory already holds a manifest.
 */
export function initProject(options?: InitOptions): void {
  const dir = path.resolve(options?.cwd ?? process.cwd(), options?.directory ?? '.');
  const projectName = options?.name ?? path.basename(dir);

  if (!PROJECT_NAME_PATTERN.test(projectName)) {
    throw new ConfigError(`Invalid project name '${projectName}'. Use letters, digits, hyphens, and underscores.`);
  }

  const manifestPath = path.join(dir, MANIFEST_FILE);
  if (fs.existsSync(manifestPath)) {
    throw new ConfigError(`${MANIFEST_FILE} already exists. This directory is already a Sprig project.`);
  }

  fs.mkdirSync(dir, { recursive: true });

  const manifest = {
    name: projectName,
    version: '0.1.0',
    entry: 'src/main.sprig',
    stdlib: true,
  };
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
  console.log(`  Created ${MANIFEST_FILE}`);

  writeIfMissing(dir, path.join('src', 'main.sprig'), `; ${projectName}: main entry point

(let greet (lambda (who) (print "Hello from" who)))

(greet "${projectName}")
`);

  writeIfMissing(dir, path.join('tests', 'main_test.sprig'), `; Tests for ${projectName}

(assert (= (+ 1 1) 2) "math works")
(assert-equal (concat "a" "b") "ab")

(print "All tests passed!")
`);

  writeIfMissing(dir, '.gitignore', `# Build artifacts
dist/

# Dependencies
node_modules/

# Editor and OS files
.idea/
.vscode/
*.swp
.DS_Store
`);

  console.log('');
  console.log(`Sprig project '${projectName}' initialized successfully!`);
  console.log('');
  console.log('To get started:');
  if (options?.directory) {
    console.log(`  cd ${options.directory}`);
  }
  console.log('  sprig run');
  console.log('');
}

function writeIfMissing(dir: string, relative: string, content: string): void {
  const file = path.join(dir, relative);
  const shown = relative.split(path.sep).join('/');
  if (fs.existsSync(file)) {
    console.log(`  ${shown} already exists, skipping`);
    return;
  }
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content, 'utf-8');
  console.log(`  Created ${shown}`);
}
