/**
 * ResourceRegistry Tests
 *
 * Tests:
 * - Registration is idempotent and resolvable by name
 * - Create by class and by type id converge on one store
 * - Creation is idempotent per name, failures leave no entry
 * - Unregistered type ids are rejected before construction
 * - Add shares ownership and refuses taken names
 * - Get, exists, remove, clear
 * - Re-entrant create from initialize keeps one instance per name
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  ResourceRegistry,
  TextFile,
  INVALID_TYPE_ID,
  getTypeId,
  getTypeName,
  integerProperty,
  stringProperty,
  type Property,
  type Resource,
} from '@reliquary/core';
import { Counter, Exploding, Palette, createRecordingLogger } from '../../helpers/resources.js';

describe('ResourceRegistry', () => {
  let registry: ResourceRegistry;
  let logger: ReturnType<typeof createRecordingLogger>;
  let tempDir: string;
  let textProps: Property[];

  beforeEach(() => {
    logger = createRecordingLogger();
    registry = new ResourceRegistry({ logger });
    Counter.reset();
    tempDir = mkdtempSync(join(tmpdir(), 'reliquary-registry-'));
    writeFileSync(join(tempDir, 'test.txt'), 'hello');
    textProps = [stringProperty('filename', join(tempDir, 'test.txt'))];
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // register / getTypeIdFromName
  // ===========================================================================

  describe('register', () => {
    it('should resolve the registered name to the class id', () => {
      registry.register(TextFile);

      assert.strictEqual(registry.getTypeIdFromName(getTypeName(TextFile)), getTypeId(TextFile));
    });

    it('should be idempotent', () => {
      const first = registry.register(TextFile);
      const second = registry.register(TextFile);

      assert.strictEqual(first, second);
      assert.strictEqual(registry.listTypes().length, 1);
      assert.strictEqual(registry.getTypeIdFromName('TextFile'), getTypeId(TextFile));
    });

    it('should return INVALID_TYPE_ID for unknown names', () => {
      assert.strictEqual(registry.getTypeIdFromName('Nope'), INVALID_TYPE_ID);
    });

    it('should use the static typeName', () => {
      registry.register(Palette);
      assert.strictEqual(registry.getTypeIdFromName('ui.Palette'), getTypeId(Palette));
      assert.strictEqual(registry.getTypeIdFromName('Palette'), INVALID_TYPE_ID);
    });

    it('should list types ordered by id', () => {
      registry.register(Palette);
      registry.register(Counter);

      const ids = registry.listTypes().map((t) => t.id);
      assert.deepStrictEqual(ids, [...ids].sort((a, b) => a - b));
      assert.strictEqual(ids.length, 2);
    });
  });

  // ===========================================================================
  // create by class
  // ===========================================================================

  describe('create by class', () => {
    it('should create and publish a resource', () => {
      const file = registry.create(TextFile, 'test', textProps);

      assert.ok(file instanceof TextFile);
      assert.strictEqual(file.getText(), 'hello');
      assert.strictEqual(registry.exists('test'), true);
      assert.strictEqual(registry.get(TextFile, 'test'), file);
    });

    it('should not require registration', () => {
      const counter = registry.create(Counter, 'c', [stringProperty('label', 'x')]);
      assert.ok(counter);
      assert.strictEqual(registry.listTypes().length, 0);
    });

    it('should return the existing instance for a taken name', () => {
      const first = registry.create(Counter, 'c', [stringProperty('label', 'a')]);
      const second = registry.create(Counter, 'c', [stringProperty('label', 'b'), integerProperty('start', 5)]);

      assert.ok(first);
      assert.strictEqual(second, first);
      assert.strictEqual(second?.label, 'a');
      assert.strictEqual(Counter.constructed, 1);
      assert.strictEqual(Counter.initialized, 1);
    });

    it('should return null and leave no entry when initialize fails', () => {
      const file = registry.create(TextFile, 'test', [stringProperty('filename', join(tempDir, 'bad_test.txt'))]);

      assert.strictEqual(file, null);
      assert.strictEqual(registry.exists('test'), false);
    });

    it('should allow a retry after a failed create', () => {
      assert.strictEqual(registry.create(Counter, 'c', []), null);

      const counter = registry.create(Counter, 'c', [stringProperty('label', 'ok')]);
      assert.strictEqual(counter?.label, 'ok');
      assert.strictEqual(registry.exists('c'), true);
    });

    it('should log a warning when initialize fails', () => {
      registry.create(Counter, 'c', []);

      const warning = logger.records.find((r) => r.level === 'warn');
      assert.deepStrictEqual(warning, {
        level: 'warn',
        message: 'Resource failed to initialize',
        context: { name: 'c', type: 'Counter' },
      });
    });

    it('should report a throwing initialize as null', () => {
      const result = registry.create(Exploding, 'x', []);

      assert.strictEqual(result, null);
      assert.strictEqual(registry.exists('x'), false);
      const error = logger.records.find((r) => r.level === 'error');
      assert.strictEqual(error?.context?.error, 'boom');
    });

    it('should return null when the stored instance is another type', () => {
      registry.create(Counter, 'shared', [stringProperty('label', 'x')]);

      const palette = registry.create(Palette, 'shared', []);

      assert.strictEqual(palette, null);
      assert.ok(registry.get(Counter, 'shared'));
    });
  });

  // ===========================================================================
  // create by type id
  // ===========================================================================

  describe('create by type id', () => {
    it('should create through the registered factory', () => {
      registry.register(TextFile);

      const resource = registry.create(registry.getTypeIdFromName('TextFile'), 'test', textProps);

      assert.ok(resource instanceof TextFile);
      assert.strictEqual(registry.exists('test'), true);
    });

    it('should share the store with the class path', () => {
      registry.register(TextFile);
      const byClass = registry.create(TextFile, 'test', textProps);

      const byId = registry.create(getTypeId(TextFile), 'test', []);

      assert.strictEqual(byId, byClass);
    });

    it('should reject INVALID_TYPE_ID', () => {
      const result = registry.create(INVALID_TYPE_ID, 'test', textProps);

      assert.strictEqual(result, null);
      assert.strictEqual(registry.exists('test'), false);
    });

    it('should reject an unregistered class id without constructing', () => {
      const id = getTypeId(Counter);

      assert.strictEqual(registry.create(id, 'c', [stringProperty('label', 'x')]), null);
      assert.strictEqual(Counter.constructed, 0);
      assert.strictEqual(registry.exists('c'), false);
    });

    it('should reject an unknown id even when the name exists', () => {
      const existing = registry.create(Counter, 'c', [stringProperty('label', 'x')]);
      assert.ok(existing);

      assert.strictEqual(registry.create(INVALID_TYPE_ID, 'c', []), null);
      assert.strictEqual(registry.get('c'), existing);
    });

    it('should return null when the factory fails', () => {
      registry.register(TextFile);

      const result = registry.create(getTypeId(TextFile), 'doc2', [stringProperty('filename', join(tempDir, 'missing.txt'))]);

      assert.strictEqual(result, null);
      assert.strictEqual(registry.exists('doc2'), false);
    });
  });

  // ===========================================================================
  // re-entrant create
  // ===========================================================================

  describe('create from inside initialize', () => {
    it('should keep the instance published by the nested call', () => {
      let nestedCalls = 0;
      let inner: Resource | null = null;
      class Nested implements Resource {
        initialize(): boolean {
          if (nestedCalls === 0) {
            nestedCalls++;
            inner = registry.create(Nested, 'x', []);
          }
          return true;
        }
      }

      const outer = registry.create(Nested, 'x', []);

      assert.strictEqual(nestedCalls, 1);
      assert.ok(outer instanceof Nested);
      assert.strictEqual(outer, inner);
      assert.strictEqual(registry.get('x'), inner);
      assert.strictEqual(registry.size, 1);
    });

    it('should keep the nested instance on the type id path', () => {
      let nestedCalls = 0;
      let inner: Resource | null = null;
      class Nested implements Resource {
        initialize(): boolean {
          if (nestedCalls === 0) {
            nestedCalls++;
            inner = registry.create(getTypeId(Nested), 'x', []);
          }
          return true;
        }
      }
      registry.register(Nested);

      const outer = registry.create(getTypeId(Nested), 'x', []);

      assert.ok(outer instanceof Nested);
      assert.strictEqual(outer, inner);
      assert.strictEqual(registry.get('x'), outer);
    });

    it('should return null when the nested call stored another type', () => {
      class Wrapper implements Resource {
        initialize(): boolean {
          registry.create(Counter, 'x', [stringProperty('label', 'inner')]);
          return true;
        }
      }

      assert.strictEqual(registry.create(Wrapper, 'x', []), null);
      assert.strictEqual(registry.get(Counter, 'x')?.label, 'inner');
    });
  });

  // ===========================================================================
  // add
  // ===========================================================================

  describe('add', () => {
    it('should keep the resource after the caller drops its reference', () => {
      let file: TextFile | null = new TextFile();
      assert.strictEqual(file.initialize(textProps), true);

      assert.strictEqual(registry.add('test', file), true);
      file = null;

      assert.strictEqual(registry.exists('test'), true);
      assert.strictEqual(registry.get(TextFile, 'test')?.getText(), 'hello');
    });

    it('should share one instance between handles', () => {
      const file = new TextFile();
      file.initialize(textProps);
      registry.add('test', file);

      const file2 = registry.get(TextFile, 'test');
      file.appendText('?');

      assert.strictEqual(file2?.getText(), 'hello?');
      assert.strictEqual(file2?.getText(), file.getText());
    });

    it('should refuse a taken name and keep the existing entry', () => {
      const first = registry.create(Counter, 'c', [stringProperty('label', 'first')]);
      const other = new Counter();
      other.initialize([stringProperty('label', 'other')]);

      assert.strictEqual(registry.add('c', other), false);
      assert.strictEqual(registry.get('c'), first);
      assert.strictEqual(logger.records.filter((r) => r.level === 'warn').length, 1);
    });

    it('should treat re-adding the same instance as a quiet no-op', () => {
      const counter = new Counter();
      counter.initialize([stringProperty('label', 'x')]);
      registry.add('c', counter);

      assert.strictEqual(registry.add('c', counter), false);
      assert.strictEqual(logger.records.filter((r) => r.level === 'warn').length, 0);
    });
  });

  // ===========================================================================
  // get / exists / remove / clear
  // ===========================================================================

  describe('get', () => {
    it('should return null for absent names', () => {
      assert.strictEqual(registry.get('missing'), null);
      assert.strictEqual(registry.get(TextFile, 'missing'), null);
    });

    it('should return null for a type mismatch', () => {
      registry.create(Counter, 'c', [stringProperty('label', 'x')]);
      assert.strictEqual(registry.get(TextFile, 'c'), null);
    });

    it('should not construct anything', () => {
      registry.get(Counter, 'c');
      assert.strictEqual(Counter.constructed, 0);
    });
  });

  describe('remove', () => {
    it('should make the name absent', () => {
      registry.create(TextFile, 'test', textProps);

      assert.strictEqual(registry.remove('test'), true);
      assert.strictEqual(registry.exists('test'), false);
    });

    it('should be a no-op for absent names', () => {
      assert.strictEqual(registry.remove('test'), false);
      assert.strictEqual(registry.remove('test'), false);
    });

    it('should leave outside references usable', () => {
      const file = registry.create(TextFile, 'test', textProps);
      registry.remove('test');

      assert.strictEqual(file?.getText(), 'hello');
    });

    it('should allow a fresh create under the same name', () => {
      const first = registry.create(TextFile, 'test', textProps);
      registry.remove('test');
      const second = registry.create(TextFile, 'test', textProps);

      assert.ok(second);
      assert.notStrictEqual(second, first);
    });
  });

  describe('inspection', () => {
    it('should report names, size and entries', () => {
      const a = registry.create(Counter, 'a', [stringProperty('label', 'a')]);
      const b = registry.create(Counter, 'b', [stringProperty('label', 'b')]);

      assert.deepStrictEqual(registry.names(), ['a', 'b']);
      assert.strictEqual(registry.size, 2);
      assert.deepStrictEqual(registry.entries(), [['a', a], ['b', b]]);
    });

    it('should report the registered type of a stored instance', () => {
      const tag = registry.register(TextFile);
      registry.create(TextFile, 'test', textProps);
      registry.create(Counter, 'c', [stringProperty('label', 'x')]);

      assert.strictEqual(registry.typeOf('test'), tag);
      assert.strictEqual(registry.typeOf('c'), null);
      assert.strictEqual(registry.typeOf('missing'), null);
    });

    it('should drop every instance on clear but keep types', () => {
      registry.register(TextFile);
      registry.create(TextFile, 'test', textProps);

      registry.clear();

      assert.strictEqual(registry.size, 0);
      assert.strictEqual(registry.exists('test'), false);
      assert.strictEqual(registry.isRegistered(getTypeId(TextFile)), true);
    });
  });
});
