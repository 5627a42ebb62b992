import { promises as fs } from 'fs';
import * as path from 'path';
import { FileConfigStore, validateConfigName } from '../../../src/config/FileConfigStore';
import { ConfigIOError, InvalidArgumentError, NotFoundError } from '../../../src/common/errors';
import { ManualClock } from '../../helpers/ManualClock';
import { createTempDir } from '../../support/cleanup';

const SAVED_AT = Date.UTC(2026, 0, 2, 3, 4, 5);
const SAVED_AT_ISO = '2026-01-02T03:04:05.000Z';

describe('FileConfigStore', () => {
  let clock: ManualClock;
  let directory: string;
  let store: FileConfigStore;

  beforeEach(async () => {
    clock = new ManualClock(SAVED_AT);
    directory = await createTempDir('config-store-test-');
    store = new FileConfigStore({ directory, clock });
  });

  describe('save and load', () => {
    it('should write JSON stamped with metadata', async () => {
      const filePath = await store.save('app', { server: { host: 'localhost', port: 8080 } });

      expect(filePath).toBe(path.join(directory, 'app.json'));
      const onDisk = JSON.parse(await fs.readFile(filePath, 'utf8'));
      expect(onDisk).toEqual({
        server: { host: 'localhost', port: 8080 },
        _metadata: { created: SAVED_AT_ISO, version: '1.0', format: 'json' }
      });
    });

    it('should read back YAML with the same values', async () => {
      await store.save('app', { server: { host: 'localhost', port: 8080 }, debug: true, tags: ['a', 'b'] }, 'yaml');

      const loaded = await store.load('app', { useCache: false });

      expect(loaded).toEqual({
        server: { host: 'localhost', port: 8080 },
        debug: true,
        tags: ['a', 'b'],
        _metadata: { created: SAVED_AT_ISO, version: '1.0', format: 'yaml' }
      });
    });

    it('should use the configured default format', async () => {
      const yamlStore = new FileConfigStore({ directory, clock, defaultFormat: 'yaml' });

      expect(await yamlStore.save('app', { a: 1 })).toBe(path.join(directory, 'app.yaml'));
    });

    it('should keep a single file per name when the format changes', async () => {
      await store.save('app', { a: 1 }, 'json');
      await store.save('app', { a: 2 }, 'yaml');

      expect(await fs.readdir(directory)).toEqual(['app.yaml']);
      expect((await store.load('app', { useCache: false })).a).toBe(2);
    });

    it('should read .yml files written by hand', async () => {
      await fs.writeFile(path.join(directory, 'legacy.yml'), 'feature:\n  enabled: true\n', 'utf8');

      expect(await store.load('legacy')).toEqual({ feature: { enabled: true } });
    });

    it('should treat an empty YAML file as an empty configuration', async () => {
      await fs.writeFile(path.join(directory, 'empty.yaml'), '', 'utf8');

      expect(await store.load('empty')).toEqual({});
    });

    it('should fail with NotFoundError for a missing configuration', async () => {
      await expect(store.load('missing')).rejects.toThrow(NotFoundError);
      await expect(store.load('missing')).rejects.toThrow("Configuration 'missing' not found");
    });

    it('should fail with ConfigIOError for unparsable content', async () => {
      await fs.writeFile(path.join(directory, 'broken.json'), '{ "a": ', 'utf8');
      await fs.writeFile(path.join(directory, 'scalar.yaml'), 'just a string\n', 'utf8');

      await expect(store.load('broken')).rejects.toThrow(ConfigIOError);
      await expect(store.load('scalar')).rejects.toThrow('top level must be a mapping');
    });

    it.each(['', '../etc', 'a/b', '..', 'name with spaces'])('should reject the name %p', async name => {
      await expect(store.save(name, {})).rejects.toThrow(InvalidArgumentError);
      await expect(store.load(name)).rejects.toThrow(InvalidArgumentError);
    });

    it('should emit config:saved', async () => {
      const saved: string[] = [];
      store.on('config:saved', name => saved.push(name));

      await store.save('app', { a: 1 });

      expect(saved).toEqual(['app']);
    });

    it('should pass the stored content with config:saved', async () => {
      const payloads: unknown[] = [];
      store.on('config:saved', (_name, _filePath, data) => payloads.push(data));

      await store.save('app', { a: 1 });

      expect(payloads).toEqual([{ a: 1, _metadata: { created: SAVED_AT_ISO, version: '1.0', format: 'json' } }]);
    });

    it('should serialize concurrent writes', async () => {
      await Promise.all([
        store.save('app', { value: 1 }),
        store.save('app', { value: 2 }),
        store.save('app', { value: 3 })
      ]);

      expect((await store.load('app', { useCache: false })).value).toBe(3);
      expect(await fs.readdir(directory)).toEqual(['app.json']);
    });
  });

  describe('caching', () => {
    it('should serve repeated loads from the cache', async () => {
      await store.save('app', { a: 1 });
      await fs.writeFile(path.join(directory, 'app.json'), JSON.stringify({ a: 99 }), 'utf8');

      expect((await store.load('app')).a).toBe(1);
      expect((await store.load('app', { useCache: false })).a).toBe(99);
      expect(store.getCacheStats().hits).toBe(1);
    });

    it('should hand out copies', async () => {
      await store.save('app', { a: 1 });

      const first = await store.load('app');
      first.a = 2;

      expect((await store.load('app')).a).toBe(1);
    });

    it('should evict the least recently used entry', async () => {
      const small = new FileConfigStore({ directory, clock, maxCacheEntries: 2 });
      await small.save('a', {});
      await small.save('b', {});
      await small.save('c', {});

      expect(small.getCacheStats()).toEqual({ size: 2, maxEntries: 2, hits: 0, misses: 0 });

      await small.load('a');
      expect(small.getCacheStats().misses).toBe(1);
    });

    it('should not cache a read that overlapped a save', async () => {
      const nextTick = () => new Promise<void>(resolve => setImmediate(resolve));

      for (let ticks = 0; ticks < 10; ticks++) {
        await store.save('app', { v: ticks * 2 });
        store.clearCache();

        const saving = store.save('app', { v: ticks * 2 + 1 });
        const loading = (async () => {
          for (let i = 0; i < ticks; i++) {
            await nextTick();
          }
          return store.load('app');
        })();
        await Promise.all([saving, loading]);

        expect((await store.load('app')).v).toBe(ticks * 2 + 1);
      }
    });

    it('should not cache a read that overlapped a delete', async () => {
      await store.save('app', { v: 1 });
      store.clearCache();

      const loading = store.load('app').catch(() => undefined);
      const deleting = store.delete('app', { createBackup: false });
      await Promise.all([loading, deleting]);

      await expect(store.load('app')).rejects.toThrow(NotFoundError);
    });

    it('should empty the cache on clearCache', async () => {
      await store.save('app', { a: 1 });
      store.clearCache();

      expect(store.getCacheStats().size).toBe(0);
    });

    it('should reject a non-positive cache size', () => {
      expect(() => new FileConfigStore({ directory, maxCacheEntries: 0 })).toThrow(InvalidArgumentError);
    });
  });

  describe('update', () => {
    it('should merge updates and back up the previous version', async () => {
      await store.save('app', { a: 1, b: 2 });
      clock.advance(60000);

      await store.update('app', { b: 3, c: 4 });

      expect(await store.load('app', { useCache: false })).toEqual({
        a: 1,
        b: 3,
        c: 4,
        _metadata: {
          created: '2026-01-02T03:05:05.000Z',
          version: '1.0',
          format: 'json',
          updated: '2026-01-02T03:05:05.000Z'
        }
      });
      expect(await store.list()).toEqual(['app', 'app_backup_20260102_030505']);
      expect((await store.load('app_backup_20260102_030505')).b).toBe(2);
    });

    it('should skip the backup when asked', async () => {
      await store.save('app', { a: 1 });

      await store.update('app', { a: 2 }, { createBackup: false });

      expect(await store.list()).toEqual(['app']);
    });

    it('should keep the format of the existing file', async () => {
      await store.save('app', { a: 1 }, 'yaml');

      const filePath = await store.update('app', { a: 2 }, { createBackup: false });

      expect(filePath).toBe(path.join(directory, 'app.yaml'));
    });

    it('should create a missing configuration without a backup', async () => {
      await store.update('fresh', { x: 1 });

      expect(await store.list()).toEqual(['fresh']);
      expect((await store.load('fresh')).x).toBe(1);
    });
  });

  describe('delete', () => {
    it('should delete and keep a backup copy', async () => {
      await store.save('app', { a: 1 });
      const deleted: string[] = [];
      store.on('config:deleted', name => deleted.push(name));

      expect(await store.delete('app')).toBe(true);

      expect(await store.list()).toEqual(['app_deleted_20260102_030405']);
      expect(deleted).toEqual(['app']);
      await expect(store.load('app')).rejects.toThrow(NotFoundError);
    });

    it('should delete without a backup when asked', async () => {
      await store.save('app', { a: 1 });

      expect(await store.delete('app', { createBackup: false })).toBe(true);
      expect(await store.list()).toEqual([]);
    });

    it('should return false for a missing configuration', async () => {
      expect(await store.delete('missing')).toBe(false);
    });
  });

  describe('batch operations', () => {
    it('should run operations in order and collect loaded configurations', async () => {
      await store.save('old', { n: 0 });

      const result = await store.runBatch([
        { op: 'save', name: 'one', data: { n: 1 } },
        { op: 'load', name: 'one' },
        { op: 'delete', name: 'old', createBackup: false },
        { op: 'load', name: 'old' },
        { op: 'delete', name: 'ghost' },
        { op: 'save', name: 'bad/name', data: {} }
      ]);

      expect(result.operationsExecuted).toBe(3);
      expect(result.errors).toEqual([
        "load old: Configuration 'old' not found",
        "delete ghost: Configuration 'ghost' not found",
        "save bad/name: Invalid configuration name 'bad/name': use letters, digits, '_', '-' or '.'"
      ]);
      expect(Object.keys(result.loadedConfigs)).toEqual(['one']);
      expect(result.loadedConfigs.one.n).toBe(1);
      expect(await store.list()).toEqual(['one']);
    });

    it('should bulk load what exists and skip the rest', async () => {
      await store.save('one', { n: 1 });
      await store.save('two', { n: 2 }, 'yaml');

      const loaded = await store.bulkLoad(['two', 'missing', 'one']);

      expect(Object.keys(loaded)).toEqual(['two', 'one']);
      expect(loaded.two.n).toBe(2);
    });
  });

  describe('list, info and export', () => {
    it('should list sorted names across formats', async () => {
      await store.save('beta', {});
      await store.save('alpha', {}, 'yaml');
      await fs.writeFile(path.join(directory, 'notes.txt'), 'ignored', 'utf8');

      expect(await store.list()).toEqual(['alpha', 'beta']);
    });

    it('should list nothing when the directory does not exist', async () => {
      const missing = new FileConfigStore({ directory: path.join(directory, 'nope') });

      expect(await missing.list()).toEqual([]);
    });

    it('should describe a stored configuration', async () => {
      await store.save('app', { a: 1 }, 'yaml');

      const info = await store.info('app');

      expect(info.name).toBe('app');
      expect(info.format).toBe('yaml');
      expect(info.filePath).toBe(path.join(directory, 'app.yaml'));
      expect(info.keys).toEqual(['a', '_metadata']);
      expect(info.metadata).toEqual({ created: SAVED_AT_ISO, version: '1.0', format: 'yaml' });
      expect(info.fileSize).toBeGreaterThan(0);
    });

    it('should export every loadable configuration', async () => {
      await store.save('one', { n: 1 });
      await store.save('two', { n: 2 }, 'yaml');
      await fs.writeFile(path.join(directory, 'bad.json'), '[1, 2]', 'utf8');
      const outputFile = path.join(directory, 'export', 'all.json');
      await fs.mkdir(path.dirname(outputFile));

      await store.exportAll(outputFile);

      const exported = JSON.parse(await fs.readFile(outputFile, 'utf8'));
      expect(Object.keys(exported)).toEqual(['one', 'two']);
      expect(exported.two.n).toBe(2);
    });
  });

  describe('validateConfigName', () => {
    it('should accept letters, digits and separators', () => {
      expect(() => validateConfigName('service_api-v2.prod')).not.toThrow();
    });

    it('should describe what is allowed', () => {
      expect(() => validateConfigName('a/b')).toThrow(
        "Invalid configuration name 'a/b': use letters, digits, '_', '-' or '.'"
      );
    });
  });
});
