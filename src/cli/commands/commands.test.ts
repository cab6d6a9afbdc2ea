/**
 * Command Handler Tests
 *
 * Handlers run against a temporary data directory with fixture databases.
 * The update service is replaced by an in-memory HTTP client.
 *
 * @module cli/commands/commands.test
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  createRouteDbFile,
  createTempDir,
  readRouteDbBytes,
  removeTempDir,
} from '../../../tests/helpers/routedb-fixture.js';
import { config } from '../../config/index.js';
import { OtaHttpError, type HttpClient } from '../../ota/http.js';
import { BaseCommand, EXIT_CODES } from '../base-command.js';
import { createServices, type CliServices } from '../services.js';
import { handleConfigSet, handleConfigShow } from './config.js';
import { handleImport, handleStatus, handleUpdate } from './db/index.js';
import { handlePosts, handleRoutes, handleSummits } from './browse/index.js';

// ============================================================================
// Test Setup
// ============================================================================

class FakeHttpClient implements HttpClient {
  listing: string | Error = '[]';
  files = new Map<string, Uint8Array>();

  async retrieveJsonResource(): Promise<string> {
    if (this.listing instanceof Error) {
      throw this.listing;
    }
    return this.listing;
  }

  async retrieveBinaryResource(url: string): Promise<Uint8Array> {
    const bytes = this.files.get(url);
    if (bytes === undefined) {
      throw new OtaHttpError('HTTP 404 Not Found', 404, url);
    }
    return bytes;
  }
}

/** One route table row, laid out like the routes command does. */
function routeRow(id: string, name: string, grade: string, rating: string): string {
  return [id.padStart(6), name.padEnd(36), grade.padEnd(8), rating.padStart(6)].join('  ');
}

describe('command handlers', () => {
  let dataDir: string;
  let tempRoot: string;
  let http: FakeHttpClient;
  let base: BaseCommand;
  let services: CliServices;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;
  let writeSpy: jest.SpiedFunction<typeof process.stdout.write>;

  /** Everything printed with console.log, one entry per call. */
  const output = (): string[] => logSpy.mock.calls.map((args) => args.map(String).join(' '));

  beforeEach(async () => {
    dataDir = await createTempDir();
    tempRoot = await createTempDir('routedb-downloads-');
    http = new FakeHttpClient();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    writeSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);

    base = new BaseCommand({ dataDir, color: false });
    services = await createServices(base, { http, tempRoot });
  });

  afterEach(async () => {
    services.store.stop();
    logSpy.mockRestore();
    warnSpy.mockRestore();
    writeSpy.mockRestore();
    await removeTempDir(dataDir);
    await removeTempDir(tempRoot);
  });

  // ==========================================================================
  // status
  // ==========================================================================

  describe('status', () => {
    it('shows the active database', async () => {
      createRouteDbFile(services.store.dbPath);

      const code = await handleStatus(base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual([
        '[OK] Route database active (2025-03-01)',
        'Schema version: 1.0',
        'Vendor: test-vendor',
        `Location: ${path.join(dataDir, 'routes.sqlite')}`,
      ]);
    });

    it('reports a missing database', async () => {
      const code = await handleStatus(base, services);

      expect(code).toBe(EXIT_CODES.NOT_FOUND);
      const lines = output();
      expect(lines[0]).toBe('[FAIL] No route data available - please import a route database file');
      expect(lines[1]).toMatch(/^ {2}Route database at .+ is not accessible: /);
    });

    it('reports an incompatible database', async () => {
      createRouteDbFile(services.store.dbPath, { major: 2 });

      const code = await handleStatus(base, services);

      expect(code).toBe(EXIT_CODES.NOT_FOUND);
      expect(output()[1]).toBe(
        `  Route database at ${services.store.dbPath} uses schema version 2.0, ` +
          'which is not accepted by the supported version 1.0'
      );
    });
  });

  // ==========================================================================
  // import
  // ==========================================================================

  describe('import', () => {
    it('activates the imported file', async () => {
      const source = createRouteDbFile(path.join(dataDir, 'incoming', 'routes-2025.sqlite'));

      const code = await handleImport(source, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual([
        `Importing ${source}`,
        '[OK] Route database active (2025-03-01)',
      ]);
      expect(readRouteDbBytes(services.store.dbPath)).toEqual(readRouteDbBytes(source));
    });

    it('fails for a missing file without a previous database', async () => {
      const missing = path.join(dataDir, 'missing.sqlite');

      const code = await handleImport(missing, base, services);

      expect(code).toBe(EXIT_CODES.ERROR);
      expect(warnSpy).toHaveBeenCalledWith(`Warning: [installer] Import file not found: ${missing}`);
    });

    it('keeps the previous database when the file is missing', async () => {
      createRouteDbFile(services.store.dbPath);

      const code = await handleImport(path.join(dataDir, 'missing.sqlite'), base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()[1]).toBe('[OK] Route database active (2025-03-01)');
    });
  });

  // ==========================================================================
  // update
  // ==========================================================================

  describe('update', () => {
    function offerRemoteDatabase(compileTime: string): void {
      const remote = createRouteDbFile(path.join(dataDir, 'remote.sqlite'), { compileTime });
      const downloadUrl = 'files/routedb_remote.sqlite';
      http.listing = JSON.stringify([
        {
          downloadUrl,
          schemaVersionMajor: 1,
          schemaVersionMinor: 0,
          creationDate: compileTime,
        },
      ]);
      http.files.set(
        new URL(downloadUrl, services.updateSource.baseUrl).toString(),
        readRouteDbBytes(remote)
      );
    }

    it('installs a newer database', async () => {
      createRouteDbFile(services.store.dbPath);
      offerRemoteDatabase('2025-04-01T00:00:00.000Z');

      const code = await handleUpdate({}, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual(['[OK] Route database active (2025-04-01)']);
      expect(services.store.getMetadata().compileTime).toEqual(
        new Date('2025-04-01T00:00:00.000Z')
      );
      expect(await fs.readdir(tempRoot)).toEqual([]);
    });

    it('installs any offered database when there is none yet', async () => {
      offerRemoteDatabase('2024-01-01T00:00:00.000Z');

      const code = await handleUpdate({}, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(services.store.isConnected()).toBe(true);
    });

    it('leaves an up-to-date database alone', async () => {
      createRouteDbFile(services.store.dbPath);
      offerRemoteDatabase('2025-02-01T00:00:00.000Z');
      const before = readRouteDbBytes(services.store.dbPath);

      const code = await handleUpdate({}, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual([]);
      expect(readRouteDbBytes(services.store.dbPath)).toEqual(before);
    });

    it('reports an unavailable update service', async () => {
      http.listing = new OtaHttpError('HTTP 503 Service Unavailable', 503, 'unused');

      const code = await handleUpdate({}, base, services);

      expect(code).toBe(EXIT_CODES.API_ERROR);
      expect(warnSpy).toHaveBeenCalledWith(
        `Warning: [installer] Request to ${new URL(config.ota.endpoint, services.updateSource.baseUrl).toString()} failed: HTTP 503 Service Unavailable`
      );
    });

    it('reports a failed download', async () => {
      offerRemoteDatabase('2025-04-01T00:00:00.000Z');
      http.files.clear();

      const code = await handleUpdate({}, base, services);

      expect(code).toBe(EXIT_CODES.API_ERROR);
      expect(services.store.isConnected()).toBe(false);
      expect(await fs.readdir(tempRoot)).toEqual([]);
    });

    describe('--check', () => {
      it('reports an available update without installing it', async () => {
        createRouteDbFile(services.store.dbPath);
        offerRemoteDatabase('2025-04-01T00:00:00.000Z');

        const code = await handleUpdate({ check: true }, base, services);

        expect(code).toBe(EXIT_CODES.SUCCESS);
        expect(output()).toEqual(['Update available: 2025-04-01 (exact schema match)']);
        expect(services.store.getMetadata().compileTime).toEqual(
          new Date('2025-03-01T12:00:00.000Z')
        );
      });

      it('reports an up-to-date database', async () => {
        createRouteDbFile(services.store.dbPath);

        const code = await handleUpdate({ check: true }, base, services);

        expect(code).toBe(EXIT_CODES.SUCCESS);
        expect(output()).toEqual(['[OK] Route database is up to date']);
      });

      it('reports a malformed listing', async () => {
        http.listing = '{"downloads": []}';

        const code = await handleUpdate({ check: true }, base, services);

        expect(code).toBe(EXIT_CODES.API_ERROR);
        expect(output()).toEqual([
          `[FAIL] Unexpected response from ${new URL(config.ota.endpoint, services.updateSource.baseUrl).toString()}: (root): Expected array, received object`,
        ]);
      });
    });
  });

  // ==========================================================================
  // browsing
  // ==========================================================================

  describe('summits', () => {
    it('lists all summits', async () => {
      createRouteDbFile(services.store.dbPath);

      const code = await handleSummits(undefined, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual([
        '    ID  SUMMIT',
        '-'.repeat(48),
        '     2  Barbarine',
        '     1  Falkenstein',
        '     3  Grosser Falkenturm',
        '',
        'Total: 3 summits',
      ]);
    });

    it('reports an empty result', async () => {
      createRouteDbFile(services.store.dbPath);

      await handleSummits('Matterhorn', base, services);

      expect(output()).toEqual(['No summits found.']);
    });

    it('needs a database', async () => {
      const code = await handleSummits(undefined, base, services);

      expect(code).toBe(EXIT_CODES.NOT_FOUND);
      expect(output()[0]).toBe(
        '[FAIL] No route data available - please import a route database file'
      );
    });
  });

  describe('routes', () => {
    beforeEach(() => {
      createRouteDbFile(services.store.dbPath);
    });

    it('lists routes in the requested order and remembers it', async () => {
      const code = await handleRoutes('1', { sort: 'rating' }, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const title = 'Routes on Falkenstein (by rating)';
      expect(output()).toEqual([
        '',
        title,
        '='.repeat(title.length),
        routeRow('ID', 'ROUTE', 'GRADE', 'RATING'),
        '-'.repeat(62),
        routeRow('11', 'Westkante', 'VIIa', '5.0'),
        routeRow('10', 'Suedriss', 'V', '4.0'),
        routeRow('12', 'Alter Weg', 'III', '-'),
      ]);

      const saved: unknown = JSON.parse(
        await fs.readFile(path.join(dataDir, 'config.json'), 'utf-8')
      );
      expect(saved).toEqual({ schemaVersion: 1, routesSortOrder: 'rating' });
    });

    it('uses the remembered order', async () => {
      await services.preferences.update({ routesSortOrder: 'grade' });

      await handleRoutes('1', {}, base, services);

      expect(output()[1]).toBe('Routes on Falkenstein (by grade)');
    });

    it('rejects an invalid summit ID', async () => {
      const code = await handleRoutes('abc', {}, base, services);

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(output()).toEqual(['[FAIL] Invalid summit ID: abc']);
    });

    it('reports an unknown summit', async () => {
      const code = await handleRoutes('99', {}, base, services);

      expect(code).toBe(EXIT_CODES.NOT_FOUND);
      expect(output()).toEqual(['[FAIL] Summit not found: 99']);
    });
  });

  describe('posts', () => {
    beforeEach(() => {
      createRouteDbFile(services.store.dbPath);
    });

    it('lists posts newest first by default', async () => {
      const code = await handlePosts('10', {}, base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      const title = 'Posts about Suedriss (newest first)';
      expect(output()).toEqual([
        '',
        title,
        '='.repeat(title.length),
        '2024-06-15  ben  rating 3',
        '  Polished holds',
        '2024-05-01  anna  rating 5',
        '  Great climb',
      ]);
    });

    it('reports a route without posts', async () => {
      await handlePosts('20', { sort: 'oldestFirst' }, base, services);

      expect(output().slice(1)).toEqual([
        'Posts about Talweg (oldest first)',
        '='.repeat('Posts about Talweg (oldest first)'.length),
        'No posts found.',
      ]);
    });

    it('reports an unknown route', async () => {
      const code = await handlePosts('99', {}, base, services);

      expect(code).toBe(EXIT_CODES.NOT_FOUND);
      expect(output()).toEqual(['[FAIL] Route not found: 99']);
    });
  });

  // ==========================================================================
  // config
  // ==========================================================================

  describe('config', () => {
    it('shows defaults and paths', async () => {
      const code = await handleConfigShow(base, services);

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual([
        '',
        'Configuration',
        '='.repeat('Configuration'.length),
        `Data directory: ${dataDir}`,
        `Config file: ${path.join(dataDir, 'config.json')}`,
        `Route database: ${path.join(dataDir, 'routes.sqlite')}`,
        `Update service: ${config.ota.baseUrl} (from environment)`,
        `Update endpoint: ${config.ota.endpoint}`,
        'Routes sort order: name (default)',
        'Posts sort order: newestFirst (default)',
      ]);
    });

    it('saves a valid setting', async () => {
      const code = await handleConfigSet(
        'otaBaseUrl',
        'https://mirror.example.net/routedb/',
        base,
        services
      );

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(output()).toEqual(['[OK] Set otaBaseUrl = https://mirror.example.net/routedb/']);
      await expect(services.preferences.load()).resolves.toEqual({
        schemaVersion: 1,
        otaBaseUrl: 'https://mirror.example.net/routedb/',
      });
    });

    it('uses a saved update service for new services', async () => {
      await handleConfigSet('otaBaseUrl', 'https://mirror.example.net/routedb', base, services);

      const reconfigured = await createServices(base, { http, tempRoot });

      expect(reconfigured.updateSource.baseUrl).toBe('https://mirror.example.net/routedb/');
    });

    it('rejects an invalid setting', async () => {
      const code = await handleConfigSet('postsSortOrder', 'random', base, services);

      expect(code).toBe(EXIT_CODES.USAGE_ERROR);
      expect(output()).toEqual([
        "[FAIL] Invalid value for postsSortOrder: (root): Invalid enum value. Expected 'newestFirst' | 'oldestFirst', received 'random'",
      ]);
    });
  });
});
