import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as path from 'path';
import { FileSystem, nodeFileSystem } from '../src/file-system.js';
import { ScopedPath } from '../src/scoped-path.js';
import { ScopedPathGroup } from '../src/scoped-path-group.js';
import { captureLogger } from './utils/capture-logger.js';
import { withTempDir, writeTree } from './utils/tmpdir.js';

describe('ScopedPathGroup', () => {
  it(
    'removes members newest first when the group is disposed',
    withTempDir((base) => {
      writeTree(base, { 'a.txt': 'a', 'b/c.txt': 'c' });
      const a = path.join(base, 'a.txt');
      const b = path.join(base, 'b');
      const { logger, stdout } = captureLogger();

      {
        using group = new ScopedPathGroup({ logger });
        group.add(a);
        group.add(b);
        expect(group.size).toBe(2);
      }

      expect(fs.readdirSync(base)).toEqual([]);
      expect(stdout()).toBe(`Removed ${b}\nRemoved ${a}\n`);
    }),
  );

  it(
    'keeps going after a member fails to clean up',
    withTempDir((base) => {
      writeTree(base, { 'a.txt': 'a', 'b.txt': 'b', 'c.txt': 'c' });
      const [a, b, c] = ['a.txt', 'b.txt', 'c.txt'].map((name) =>
        path.join(base, name),
      );
      const { logger, stdout, stderr } = captureLogger();
      const fileSystem: FileSystem = {
        ...nodeFileSystem,
        removeEntry: (target) => {
          if (target === a) {
            throw Object.assign(new Error('EBUSY: resource busy'), {
              code: 'EBUSY',
            });
          }
          nodeFileSystem.removeEntry(target);
        },
      };

      const group = new ScopedPathGroup({ logger, fileSystem });
      group.add(a);
      group.add(b);
      group.add(c);

      expect(() => group.dispose()).not.toThrow();

      expect(fs.readdirSync(base)).toEqual(['a.txt']);
      expect(stdout()).toBe(`Removed ${c}\nRemoved ${b}\n`);
      expect(stderr()).toBe(`Failed to remove ${a}\nEBUSY: resource busy\n`);
    }),
  );

  it(
    'moves an added handle into the group',
    withTempDir((base) => {
      const file = path.join(base, 'owned.txt');
      fs.writeFileSync(file, 'spam');
      const original = new ScopedPath(file);
      const group = new ScopedPathGroup();

      const owned = group.add(original);
      original.dispose();

      expect(original.isArmed).toBe(false);
      expect(owned.isArmed).toBe(true);
      expect(fs.existsSync(file)).toBe(true);

      group.dispose();
      expect(fs.existsSync(file)).toBe(false);
    }),
  );

  it(
    'keeps a held handle held when it is added',
    withTempDir((base) => {
      const file = path.join(base, 'kept.txt');
      fs.writeFileSync(file, 'spam');
      const kept = new ScopedPath(file);
      kept.hold();

      {
        using group = new ScopedPathGroup();
        const owned = group.add(kept);
        expect(owned.isArmed).toBe(false);
      }

      expect(fs.readFileSync(file, 'utf8')).toBe('spam');
    }),
  );

  it(
    'creates temp members with the group options',
    withTempDir((base) => {
      const group = new ScopedPathGroup({ directory: base, prefix: 'grp-' });

      const tmp = group.temp();

      expect(tmp.dirname()).toBe(base);
      expect(tmp.basename().startsWith('grp-')).toBe(true);
      expect(group.size).toBe(1);
      group.dispose();
    }),
  );

  it(
    'hold keeps every member and empties the group',
    withTempDir((base) => {
      writeTree(base, { 'a.txt': 'a', 'b.txt': 'b' });
      const a = path.join(base, 'a.txt');
      const b = path.join(base, 'b.txt');
      let held: string[] = [];

      {
        using group = new ScopedPathGroup();
        group.add(a);
        group.add(b);
        held = group.hold();
        expect(group.size).toBe(0);
      }

      expect(held).toEqual([a, b]);
      expect(fs.readdirSync(base).sort()).toEqual(['a.txt', 'b.txt']);
    }),
  );

  it(
    'is empty after disposal and disposes only once',
    withTempDir((base) => {
      const file = path.join(base, 'f.txt');
      fs.writeFileSync(file, 'first');
      const group = new ScopedPathGroup();
      group.add(file);

      group.dispose();
      expect(group.size).toBe(0);

      fs.writeFileSync(file, 'second');
      group[Symbol.dispose]();
      expect(fs.readFileSync(file, 'utf8')).toBe('second');
    }),
  );
});
