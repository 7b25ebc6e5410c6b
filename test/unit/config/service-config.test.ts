/**
 * Service Config Loader Tests
 */

import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ErrorCode } from '../../../src/errors/error-codes';
import { isSupervisorError } from '../../../src/errors/supervisor-error';
import {
  DEFAULT_SERVICE_CONFIG,
  applyOverrides,
  loadServiceConfig,
  mergeWithDefaults,
  parseServiceConfig,
} from '../../../src/config/service-config';

describe('Service Config', () => {
  describe('parseServiceConfig()', () => {
    it('returns the defaults for an empty document', () => {
      assert.deepEqual(parseServiceConfig(''), DEFAULT_SERVICE_CONFIG);
    });

    it('merges given keys over the defaults', () => {
      const config = parseServiceConfig([
        'server:',
        '  port: 6000',
        'supervisor:',
        '  gracePeriodMs: 250',
        'logging:',
        '  console: false',
      ].join('\n'));

      assert.equal(config.server.port, 6000);
      assert.equal(config.server.host, '127.0.0.1');
      assert.equal(config.supervisor.gracePeriodMs, 250);
      assert.equal(config.supervisor.drainTimeoutMs, 2000);
      assert.equal(config.logging.console, false);
      assert.equal(config.logging.maxEntries, 1000);
    });

    it('accepts custom classification patterns', () => {
      const config = parseServiceConfig([
        'classification:',
        "  warning: ['^WARN\\b', 'careful']",
      ].join('\n'));

      assert.deepEqual(config.classification.warning, ['^WARN\\b', 'careful']);
      assert.deepEqual(config.classification.error, DEFAULT_SERVICE_CONFIG.classification.error);
    });

    it('lists every violation in one error', () => {
      assert.throws(
        () => parseServiceConfig('server:\n  port: 70000\nlogging:\n  console: "yes"\n', 'test.yaml'),
        (error: unknown) => {
          if (!isSupervisorError(error, ErrorCode.E101_INVALID_CONFIG)) {
            return false;
          }
          assert.equal(
            error.message,
            '[E101] Run configuration is invalid: test.yaml: ' +
              'server.port must be an integer between 0 and 65535; logging.console must be true or false'
          );
          assert.deepEqual(error.details, {
            violations: [
              'server.port must be an integer between 0 and 65535',
              'logging.console must be true or false',
            ],
          });
          return true;
        }
      );
    });

    it('rejects a section that is not a mapping', () => {
      assert.throws(
        () => parseServiceConfig('broadcast: 5\n', 'test.yaml'),
        /test\.yaml: broadcast must be a mapping/
      );
    });

    it('rejects a heartbeat shorter than one second', () => {
      assert.throws(
        () => parseServiceConfig('broadcast:\n  heartbeatIntervalMs: 10\n', 'test.yaml'),
        /broadcast\.heartbeatIntervalMs must be an integer between 1000 and/
      );
    });

    it('rejects a pattern that is not a regular expression', () => {
      assert.throws(
        () => parseServiceConfig("classification:\n  error: ['(']\n", 'test.yaml'),
        /classification\.error: Invalid regular expression/
      );
    });

    it('rejects malformed YAML', () => {
      assert.throws(
        () => parseServiceConfig('server: [\n', 'test.yaml'),
        (error: unknown) => isSupervisorError(error, ErrorCode.E101_INVALID_CONFIG)
      );
    });
  });

  describe('mergeWithDefaults()', () => {
    it('rejects a top level that is not a mapping', () => {
      assert.throws(
        () => mergeWithDefaults(['a'], 'list.yaml'),
        (error: unknown) =>
          isSupervisorError(error) &&
          error.message === '[E101] Run configuration is invalid: list.yaml: top level must be a mapping'
      );
    });
  });

  describe('loadServiceConfig()', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'supervisor-config-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('prefers config/supervisor.yaml in the working directory', () => {
      fs.mkdirSync(path.join(tmpDir, 'config'));
      const file = path.join(tmpDir, 'config', 'supervisor.yaml');
      fs.writeFileSync(file, 'server:\n  port: 7001\n');

      const loaded = loadServiceConfig(undefined, tmpDir);

      assert.equal(loaded.source, file);
      assert.equal(loaded.config.server.port, 7001);
    });

    it('also finds a .yml file', () => {
      fs.mkdirSync(path.join(tmpDir, 'config'));
      const file = path.join(tmpDir, 'config', 'supervisor.yml');
      fs.writeFileSync(file, 'server:\n  port: 7002\n');

      assert.equal(loadServiceConfig(undefined, tmpDir).source, file);
    });

    it('falls back to the config shipped with the package', () => {
      const shipped = path.resolve(__dirname, '..', '..', '..', 'config', 'supervisor.yaml');

      const loaded = loadServiceConfig(undefined, tmpDir);

      assert.equal(loaded.source, shipped);
      assert.deepEqual(loaded.config, DEFAULT_SERVICE_CONFIG);
    });

    it('resolves an explicit path against the working directory', () => {
      fs.writeFileSync(path.join(tmpDir, 'custom.yaml'), 'profiles:\n  path: runs.json\n');

      const loaded = loadServiceConfig('custom.yaml', tmpDir);

      assert.equal(loaded.source, path.join(tmpDir, 'custom.yaml'));
      assert.equal(loaded.config.profiles.path, 'runs.json');
    });

    it('throws when an explicit path does not exist', () => {
      assert.throws(
        () => loadServiceConfig('nope.yaml', tmpDir),
        { message: `Config file not found: ${path.join(tmpDir, 'nope.yaml')}` }
      );
    });
  });

  describe('applyOverrides()', () => {
    it('lets command line values win', () => {
      const config = applyOverrides(DEFAULT_SERVICE_CONFIG, { port: 0, profilesPath: 'other.json' });

      assert.equal(config.server.port, 0);
      assert.equal(config.server.host, '127.0.0.1');
      assert.equal(config.profiles.path, 'other.json');
      assert.equal(config.supervisor, DEFAULT_SERVICE_CONFIG.supervisor);
    });
  });
});
