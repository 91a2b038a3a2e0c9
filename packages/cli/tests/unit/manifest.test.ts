/**
 * Manifest parsing tests
 * @module @vnode/cli/tests/unit/manifest
 */

import { describe, it, expect } from 'vitest';
import { createPodRegistry } from '@vnode/core';
import { parseManifest, registerPods } from '../../src/manifest.js';

const web = {
  metadata: { namespace: 'default', name: 'web' },
  spec: { containers: [{ name: 'nginx', image: 'nginx:1.25' }] },
};

const api = {
  metadata: {
    namespace: 'default',
    name: 'api',
    annotations: { 'vk/PodIP': '10.0.0.8' },
    creationTimestamp: '2024-03-01T08:30:00.000Z',
  },
  spec: { containers: [{ name: 'server' }, { name: 'proxy' }] },
};

describe('Manifest Module', () => {
  describe('parseManifest', () => {
    it('should read an array of pods', () => {
      const { pods, problems } = parseManifest(JSON.stringify([web, api]));

      expect(problems).toEqual([]);
      expect(pods.map((pod) => pod.metadata.name)).toEqual(['web', 'api']);
    });

    it('should accept a single pod object', () => {
      const { pods } = parseManifest(JSON.stringify(web));

      expect(pods).toHaveLength(1);
      expect(pods[0]?.spec.containers[0]?.image).toBe('nginx:1.25');
    });

    it('should revive creation timestamps', () => {
      const { pods } = parseManifest(JSON.stringify([api]));
      const timestamp = pods[0]?.metadata.creationTimestamp;

      expect(timestamp).toBeInstanceOf(Date);
      expect(timestamp?.toISOString()).toBe('2024-03-01T08:30:00.000Z');
    });

    it('should report an unparseable timestamp', () => {
      const stale = { ...web, metadata: { ...web.metadata, creationTimestamp: 'yesterday' } };

      const { pods, problems } = parseManifest(JSON.stringify([stale]));

      expect(pods).toEqual([]);
      expect(problems).toEqual([
        {
          field: '[0].metadata.creationTimestamp',
          message: 'Creation timestamp must be a Date',
          rule: 'type',
        },
      ]);
    });

    it('should keep valid entries and report invalid ones by index', () => {
      const nameless = { metadata: { namespace: 'default' }, spec: { containers: [] } };

      const { pods, problems } = parseManifest(JSON.stringify([web, nameless]));

      expect(pods.map((pod) => pod.metadata.name)).toEqual(['web']);
      expect(problems).toEqual([
        { field: '[1].metadata.name', message: 'This field is required', rule: 'required' },
      ]);
    });

    it('should report duplicate container names', () => {
      const twins = {
        metadata: { namespace: 'default', name: 'twins' },
        spec: { containers: [{ name: 'app' }, { name: 'app' }] },
      };

      const { problems } = parseManifest(JSON.stringify([twins]));

      expect(problems).toEqual([
        {
          field: '[0].spec.containers[1].name',
          message: "Duplicate container name 'app'",
          rule: 'unique',
          received: 'app',
        },
      ]);
    });

    it('should fail on content that is not JSON', () => {
      expect(() => parseManifest('pods:\n  - web')).toThrow('Manifest is not valid JSON');
    });
  });

  describe('registerPods', () => {
    it('should register pods and report taken identities', () => {
      const registry = createPodRegistry();
      const { pods } = parseManifest(JSON.stringify([web, api, web]));

      const { records, problems } = registerPods(registry, pods);

      expect(records.map((record) => record.metadata.name)).toEqual(['web', 'api']);
      expect(records[1]?.status.podIP).toBe('10.0.0.8');
      expect(problems).toEqual([
        {
          field: 'metadata.name',
          message: 'Pod "web" in namespace "default" already exists',
          rule: 'unique',
          received: 'default/web',
        },
      ]);
      expect(registry.podCount.value).toBe(2);
    });
  });
});
