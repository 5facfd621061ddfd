/**
 * Project manifest (`sprig.json`) discovery and validation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SprigError } from '../../interpreter/src';

export const MANIFEST_FILE = 'sprig.json';

export const PROJECT_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;

export const manifestSchema = z.object({
  name: z.string().regex(PROJECT_NAME_PATTERN, 'use letters, digits, hyphens, and underscores, starting with a letter'),
  version: z.string().default('0.1.0'),
  entry: z.string().default('src/main.sprig'),
  stdlib: z.boolean().default(false),
  repl: z.object({
    prompt: z.string().default('sprig> '),
  }).optional(),
});

export type Manifest = z.infer<typeof manifestSchema>;

export class ConfigError extends SprigError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Find the nearest `sprig.json`, starting at `startDir` and walking up.
 */
export function findManifest(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, MANIFEST_FILE);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read and validate a manifest, filling in defaults.
 */
export function loadManifest(file: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${where}: ${issue.message}`;
    });
    throw new ConfigError([`Invalid ${MANIFEST_FILE} at ${file}:`, ...issues].join('\n'));
  }
  return result.data;
}

/**
 * Absolute path of the manifest's entry file.
 */
export function resolveEntry(manifestPath: string, manifest: Manifest): string {
  return path.resolve(path.dirname(manifestPath), manifest.entry);
}
