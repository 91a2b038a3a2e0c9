/**
 * CLI configuration tests
 * @module @vnode/cli/tests/unit/config
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'node:fs';

vi.mock('node:fs');

import {
  configFromEnv,
  configFromFlags,
  mergeConfigLayers,
  resolveProviderConfig,
} from '../../src/config.js';
import { ValidationError } from '@vnode/shared';

/**
 * Makes the mocked file system hold one file
 */
function mockConfigFile(content: string): void {
  vi.mocked(fs.existsSync).mockReturnValue(true);
  vi.mocked(fs.readFileSync).mockReturnValue(content);
}

describe('Config Module', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe('resolveProviderConfig', () => {
    it('should return the defaults with nothing set', () => {
      expect(resolveProviderConfig({}, {})).toEqual({
        nodeName: 'virtual-node',
        operatingSystem: 'linux',
        capacity: { cpu: '20', memory: '100Gi', pods: '20' },
        heartbeatIntervalMs: 15000,
        logLevel: 'info',
      });
    });

    it('should apply environment variables', () => {
      const config = resolveProviderConfig({}, {
        VNODE_NODE_NAME: 'edge-1',
        VNODE_CPU: '4',
        VNODE_PODS: '50',
        LOG_LEVEL: 'debug',
      });

      expect(config.nodeName).toBe('edge-1');
      expect(config.capacity).toEqual({ cpu: '4', memory: '100Gi', pods: '50' });
      expect(config.logLevel).toBe('debug');
    });

    it('should let flags override the environment', () => {
      const config = resolveProviderConfig(
        { cpu: '8', nodeName: 'from-flag', heartbeatInterval: '2000' },
        { VNODE_CPU: '4', VNODE_NODE_NAME: 'from-env', VNODE_MEMORY: '8Gi' },
      );

      expect(config.nodeName).toBe('from-flag');
      expect(config.capacity).toEqual({ cpu: '8', memory: '8Gi', pods: '20' });
      expect(config.heartbeatIntervalMs).toBe(2000);
    });

    it('should layer the config file under the environment', () => {
      mockConfigFile(JSON.stringify({
        nodeName: 'from-file',
        capacity: { memory: '64Gi' },
        heartbeatIntervalMs: 5000,
      }));

      const config = resolveProviderConfig(
        { config: '/etc/vnode/config.json' },
        { VNODE_NODE_NAME: 'from-env' },
      );

      expect(fs.readFileSync).toHaveBeenCalledWith('/etc/vnode/config.json', 'utf-8');
      expect(config).toEqual({
        nodeName: 'from-env',
        operatingSystem: 'linux',
        capacity: { cpu: '20', memory: '64Gi', pods: '20' },
        heartbeatIntervalMs: 5000,
        logLevel: 'info',
      });
    });

    it('should drop unknown keys from the config file', () => {
      mockConfigFile(JSON.stringify({ nodeName: 'edge-2', extra: true }));

      const config = resolveProviderConfig({ config: 'config.json' }, {});

      expect(Object.keys(config)).toEqual([
        'nodeName',
        'operatingSystem',
        'capacity',
        'heartbeatIntervalMs',
        'logLevel',
      ]);
    });

    it('should fail when the config file is missing', () => {
      vi.mocked(fs.existsSync).mockReturnValue(false);

      expect(() => resolveProviderConfig({ config: 'missing.json' }, {})).toThrow(
        'Config file not found: missing.json',
      );
    });

    it('should fail on a config file that is not JSON', () => {
      mockConfigFile('nodeName: edge');

      expect(() => resolveProviderConfig({ config: 'config.yaml' }, {})).toThrow(
        'Config file is not valid JSON: config.yaml',
      );
    });

    it('should fail on a config file that is not an object', () => {
      mockConfigFile('["edge"]');

      expect(() => resolveProviderConfig({ config: 'config.json' }, {})).toThrow(
        'Config file must contain a JSON object: config.json',
      );
    });

    it('should reject an invalid quantity', () => {
      let caught: unknown;
      try {
        resolveProviderConfig({ cpu: 'lots' }, {});
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        message: 'Invalid configuration for fields: capacity.cpu',
        details: [
          {
            field: 'capacity.cpu',
            message: "Invalid quantity 'lots'",
            rule: 'format',
            received: 'lots',
          },
        ],
      });
    });

    it('should reject a fractional pod count', () => {
      expect(() => resolveProviderConfig({ pods: '2.5' }, {})).toThrow(
        'Invalid configuration for fields: capacity.pods',
      );
    });

    it('should reject a heartbeat interval that is not a number', () => {
      expect(() => resolveProviderConfig({ heartbeatInterval: 'soon' }, {})).toThrow(
        'Invalid configuration for fields: heartbeatIntervalMs',
      );
    });

    it('should reject a node name that is not a DNS name', () => {
      expect(() => resolveProviderConfig({ nodeName: 'Bad_Name' }, {})).toThrow(
        'Invalid configuration for fields: nodeName',
      );
    });

    it('should reject an unknown log level', () => {
      expect(() => resolveProviderConfig({}, { LOG_LEVEL: 'verbose' })).toThrow(
        'Invalid configuration for fields: logLevel',
      );
    });

    it('should reject an unsupported operating system from the config file', () => {
      mockConfigFile(JSON.stringify({ operatingSystem: 'windows' }));

      expect(() => resolveProviderConfig({ config: 'config.json' }, {})).toThrow(
        'Invalid configuration for fields: operatingSystem',
      );
    });

    it('should report every invalid field at once', () => {
      expect(() => resolveProviderConfig({ cpu: '-1', memory: 'much' }, {})).toThrow(
        'Invalid configuration for fields: capacity.cpu, capacity.memory',
      );
    });
  });

  describe('configFromEnv', () => {
    it('should ignore empty variables', () => {
      expect(configFromEnv({ VNODE_NODE_NAME: '', VNODE_CPU: '' })).toEqual({});
    });
  });

  describe('configFromFlags', () => {
    it('should convert the heartbeat interval to a number', () => {
      expect(configFromFlags({ heartbeatInterval: '750' })).toEqual({ heartbeatIntervalMs: 750 });
    });
  });

  describe('mergeConfigLayers', () => {
    it('should merge capacity entries individually', () => {
      expect(mergeConfigLayers(
        { capacity: { cpu: '1', memory: '1Gi' } },
        { capacity: { memory: '2Gi' } },
        { nodeName: 'n' },
      )).toEqual({
        nodeName: 'n',
        capacity: { cpu: '1', memory: '2Gi' },
      });
    });

    it('should let a malformed capacity through for validation to report', () => {
      expect(mergeConfigLayers({ capacity: { cpu: '1' } }, { capacity: 5 })).toEqual({ capacity: 5 });
    });
  });
});
