import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError, findManifest, loadManifest, resolveEntry } from '../src/config';
import { SprigError } from '../../interpreter/src';

describe('manifest', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sprig-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeManifest(content: unknown, where = dir): string {
    const file = path.join(where, 'sprig.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
    return file;
  }

  test('findManifest walks up from nested directories', () => {
    const file = writeManifest({ name: 'demo' });
    const nested = path.join(dir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    expect(findManifest(nested)).toBe(file);
    expect(findManifest(dir)).toBe(file);
  });

  test('fills in defaults', () => {
    const file = writeManifest({ name: 'demo' });
    expect(loadManifest(file)).toEqual({
      name: 'demo',
      version: '0.1.0',
      entry: 'src/main.sprig',
      stdlib: false,
    });
  });

  test('repl settings get a default prompt', () => {
    const file = writeManifest({ name: 'demo', repl: {} });
    expect(loadManifest(file).repl).toEqual({ prompt: 'sprig> ' });
  });

  test('lists every problem', () => {
    const file = writeManifest({ stdlib: 'yes' });
    expect(() => loadManifest(file)).toThrow(ConfigError);
    expect(() => loadManifest(file)).toThrow(
      `Invalid sprig.json at ${file}:\n  name: Required\n  stdlib: Expected boolean, received string`,
    );
  });

  test('rejects bad project names', () => {
    const file = writeManifest({ name: '9lives' });
    expect(() => loadManifest(file)).toThrow(
      `Invalid sprig.json at ${file}:\n  name: use letters, digits, hyphens, and underscores, starting with a letter`,
    );
  });

  test('malformed JSON is a ConfigError', () => {
    const file = writeManifest('{ not json');
    try {
      loadManifest(file);
      throw new Error('expected loadManifest to fail');
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e).toBeInstanceOf(SprigError);
      if (e instanceof ConfigError) {
        expect(e.message.startsWith(`Cannot read ${file}: `)).toBe(true);
      }
    }
  });

  test('resolveEntry is relative to the manifest', () => {
    const file = writeManifest({ name: 'demo', entry: 'lib/start.sprig' });
    expect(resolveEntry(file, loadManifest(file))).toBe(path.join(dir, 'lib', 'start.sprig'));
  });
});
