/**
 * Unit tests for the pod registry
 * @module @vnode/core/tests/unit/pod-store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { isRef } from '@vue/reactivity';
import { ErrorCode, PodError, isAlreadyExists, isNotFound } from '@vnode/shared';

import { PodRegistry, createPodRegistry } from '../../src';
import { FIXED_NOW, fixedClock, makePod } from './helpers';

describe('PodRegistry', () => {
  let registry: PodRegistry;

  beforeEach(() => {
    registry = createPodRegistry({ clock: fixedClock });
  });

  describe('create', () => {
    it('should synthesize a Running status with one ready condition', () => {
      const record = registry.create(makePod('default', 'web', ['nginx']));

      expect(record.status.phase).toBe('Running');
      expect(record.status.conditions).toEqual([
        { type: 'Ready', status: 'True', lastTransitionTime: FIXED_NOW },
      ]);
      expect(record.status.startTime).toEqual(FIXED_NOW);
    });

    it('should create one running, ready status per container', () => {
      const record = registry.create(makePod('default', 'web', ['nginx', 'sidecar']));

      expect(record.status.containerStatuses).toEqual([
        {
          name: 'nginx',
          image: 'nginx:latest',
          state: { running: { startedAt: FIXED_NOW } },
          ready: true,
          restartCount: 0,
        },
        {
          name: 'sidecar',
          image: 'sidecar:latest',
          state: { running: { startedAt: FIXED_NOW } },
          ready: true,
          restartCount: 0,
        },
      ]);
    });

    it('should copy the pod IP from the vk/PodIP annotation', () => {
      const record = registry.create(
        makePod('default', 'web', ['nginx'], { 'vk/PodIP': '10.1.2.3' }),
      );

      expect(record.status.podIP).toBe('10.1.2.3');
    });

    it('should use an empty pod IP when the annotation is absent', () => {
      const record = registry.create(makePod('default', 'web'));

      expect(record.status.podIP).toBe('');
    });

    it('should not validate the pod IP annotation', () => {
      const record = registry.create(
        makePod('default', 'web', ['nginx'], { 'vk/PodIP': 'not-an-ip' }),
      );

      expect(record.status.podIP).toBe('not-an-ip');
    });

    it('should make the record immediately visible', () => {
      registry.create(makePod('default', 'web'));

      expect(registry.has('default', 'web')).toBe(true);
      expect(registry.get('default', 'web').metadata.name).toBe('web');
      expect(registry.list()).toHaveLength(1);
    });

    it('should reject a duplicate identity with AlreadyExists', () => {
      registry.create(makePod('default', 'web', ['nginx']));

      let caught: unknown;
      try {
        registry.create(makePod('default', 'web', ['other']));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PodError);
      expect(isAlreadyExists(caught)).toBe(true);
      expect(caught).toMatchObject({
        code: ErrorCode.POD_ALREADY_EXISTS,
        statusCode: 409,
        message: 'Pod "web" in namespace "default" already exists',
      });
    });

    it('should keep exactly one record after a rejected duplicate', () => {
      registry.create(makePod('default', 'web', ['nginx']));
      expect(() => registry.create(makePod('default', 'web', ['other']))).toThrow(PodError);

      const pods = registry.list();
      expect(pods).toHaveLength(1);
      expect(pods[0]?.status.containerStatuses.map(c => c.name)).toEqual(['nginx']);
    });

    it('should allow the same name in different namespaces', () => {
      registry.create(makePod('default', 'web'));
      registry.create(makePod('staging', 'web'));

      expect(registry.list()).toHaveLength(2);
    });

    it('should keep identities apart when a slash moves between namespace and name', () => {
      registry.create(makePod('a/b', 'c'));
      registry.create(makePod('a', 'b/c'));

      expect(registry.list().map(p => [p.metadata.namespace, p.metadata.name])).toEqual([
        ['a/b', 'c'],
        ['a', 'b/c'],
      ]);
      expect(registry.get('a', 'b/c').metadata.namespace).toBe('a');
      expect(registry.has('a/b', 'b/c')).toBe(false);
    });

    it('should allow re-creating a pod after it was deleted', () => {
      registry.create(makePod('default', 'web', ['nginx']));
      registry.delete('default', 'web');
      const record = registry.create(makePod('default', 'web', ['httpd']));

      expect(record.status.containerStatuses.map(c => c.name)).toEqual(['httpd']);
    });

    it('should assign a uid when none is supplied', () => {
      const record = registry.create(makePod('default', 'web'));

      expect(record.metadata.uid).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should keep a supplied uid', () => {
      const pod = makePod('default', 'web');
      pod.metadata.uid = 'uid-1';

      expect(registry.create(pod).metadata.uid).toBe('uid-1');
    });

    it('should preserve container order per pod', () => {
      const first = registry.create(makePod('default', 'ab', ['a', 'b']));
      const second = registry.create(makePod('default', 'ba', ['b', 'a']));

      expect(first.status.containerStatuses.map(c => c.name)).toEqual(['a', 'b']);
      expect(second.status.containerStatuses.map(c => c.name)).toEqual(['b', 'a']);
      expect(first.status.containerStatuses.every(c => c.ready)).toBe(true);
      expect(second.status.containerStatuses.every(c => c.ready)).toBe(true);
    });

    it('should accept a pod without containers', () => {
      const record = registry.create(makePod('default', 'empty', []));

      expect(record.status.containerStatuses).toEqual([]);
    });
  });

  describe('isolation', () => {
    it('should not be affected by mutating the input after create', () => {
      const pod = makePod('default', 'web', ['nginx']);
      registry.create(pod);

      pod.spec.containers.push({ name: 'late' });
      pod.metadata.name = 'renamed';

      const stored = registry.get('default', 'web');
      expect(stored.spec.containers.map(c => c.name)).toEqual(['nginx']);
      expect(stored.metadata.name).toBe('web');
    });

    it('should not be affected by mutating a returned record', () => {
      registry.create(makePod('default', 'web', ['nginx']));

      const copy = registry.get('default', 'web');
      copy.status.phase = 'Terminated';
      copy.status.containerStatuses.pop();

      const stored = registry.get('default', 'web');
      expect(stored.status.phase).toBe('Running');
      expect(stored.status.containerStatuses).toHaveLength(1);
    });

    it('should not be affected by mutating a listed record', () => {
      registry.create(makePod('default', 'web', ['nginx']));

      registry.list()[0]?.status.conditions.splice(0);

      expect(registry.getStatus('default', 'web').conditions).toHaveLength(1);
    });
  });

  describe('update', () => {
    it('should leave the original record unchanged', () => {
      registry.create(makePod('default', 'web', ['nginx']));

      registry.update(makePod('default', 'web', ['httpd', 'sidecar']));

      const stored = registry.get('default', 'web');
      expect(stored.status.containerStatuses.map(c => c.name)).toEqual(['nginx']);
      expect(stored.spec.containers.map(c => c.name)).toEqual(['nginx']);
    });

    it('should not create a record for an unknown pod', () => {
      expect(() => registry.update(makePod('default', 'ghost'))).not.toThrow();

      expect(registry.has('default', 'ghost')).toBe(false);
      expect(registry.list()).toEqual([]);
    });
  });

  describe('delete', () => {
    it('should remove exactly the matching record', () => {
      registry.create(makePod('default', 'web'));
      registry.create(makePod('default', 'api'));
      registry.create(makePod('staging', 'web'));

      const removed = registry.delete('default', 'web');

      expect(removed?.metadata.name).toBe('web');
      expect(removed?.metadata.namespace).toBe('default');
      expect(registry.list().map(p => `${p.metadata.namespace}/${p.metadata.name}`)).toEqual([
        'default/api',
        'staging/web',
      ]);
    });

    it('should not remove a pod whose identity only matches after joining with a slash', () => {
      registry.create(makePod('a/b', 'c'));

      expect(registry.delete('a', 'b/c')).toBeUndefined();
      expect(registry.has('a/b', 'c')).toBe(true);
      expect(() => registry.getStatus('a', 'b/c')).toThrow(PodError);
    });

    it('should succeed without change for an absent identity', () => {
      registry.create(makePod('default', 'web'));
      const before = registry.list();

      expect(registry.delete('default', 'missing')).toBeUndefined();
      expect(registry.list()).toEqual(before);
    });

    it('should be repeatable', () => {
      registry.create(makePod('default', 'web'));

      expect(registry.delete('default', 'web')).toBeDefined();
      expect(registry.delete('default', 'web')).toBeUndefined();
      expect(registry.has('default', 'web')).toBe(false);
    });

    it('should only remove a record whose uid matches when one is given', () => {
      const pod = makePod('default', 'web');
      pod.metadata.uid = 'uid-1';
      registry.create(pod);

      expect(registry.delete('default', 'web', 'uid-2')).toBeUndefined();
      expect(registry.has('default', 'web')).toBe(true);

      expect(registry.delete('default', 'web', 'uid-1')?.metadata.uid).toBe('uid-1');
      expect(registry.has('default', 'web')).toBe(false);
    });
  });

  describe('queries', () => {
    it('should fail get with NotFound for an absent identity', () => {
      let caught: unknown;
      try {
        registry.get('default', 'web');
      } catch (error) {
        caught = error;
      }

      expect(isNotFound(caught)).toBe(true);
      expect(caught).toMatchObject({
        code: ErrorCode.POD_NOT_FOUND,
        statusCode: 404,
        message: 'Pod "web" in namespace "default" not found',
      });
    });

    it('should fail getStatus with NotFound for an absent identity', () => {
      expect(() => registry.getStatus('default', 'web')).toThrow(
        'Pod "web" in namespace "default" not found',
      );
    });

    it('should return undefined from find for an absent identity', () => {
      expect(registry.find('default', 'web')).toBeUndefined();
    });

    it('should project the status from getStatus', () => {
      registry.create(makePod('default', 'web', ['nginx'], { 'vk/PodIP': '10.0.0.7' }));

      const status = registry.getStatus('default', 'web');
      expect(status.phase).toBe('Running');
      expect(status.podIP).toBe('10.0.0.7');
      expect(status).toEqual(registry.get('default', 'web').status);
    });

    it('should list pods in insertion order', () => {
      registry.create(makePod('default', 'c'));
      registry.create(makePod('default', 'a'));
      registry.create(makePod('other', 'b'));

      expect(registry.list().map(p => p.metadata.name)).toEqual(['c', 'a', 'b']);
    });

    it('should list nothing when empty', () => {
      expect(registry.list()).toEqual([]);
    });
  });

  describe('uniqueness', () => {
    it('should never list two records with one identity', () => {
      const names = ['a', 'b', 'c'];
      const namespaces = ['default', 'kube-system'];

      for (let round = 0; round < 30; round++) {
        const namespace = namespaces[round % namespaces.length] ?? 'default';
        const name = names[round % names.length] ?? 'a';

        if (round % 4 === 3) {
          registry.delete(namespace, name);
        } else if (registry.has(namespace, name)) {
          expect(() => registry.create(makePod(namespace, name))).toThrow(PodError);
        } else {
          registry.create(makePod(namespace, name));
        }

        const keys = registry.list().map(p => `${p.metadata.namespace}/${p.metadata.name}`);
        expect(new Set(keys).size).toBe(keys.length);
      }
    });
  });

  describe('computed views', () => {
    it('should expose podCount as a ref that follows the table', () => {
      expect(isRef(registry.podCount)).toBe(true);
      expect(registry.podCount.value).toBe(0);

      registry.create(makePod('default', 'web'));
      registry.create(makePod('default', 'api'));
      expect(registry.podCount.value).toBe(2);

      registry.delete('default', 'web');
      expect(registry.podCount.value).toBe(1);
    });

    it('should group pod names by namespace', () => {
      registry.create(makePod('default', 'web'));
      registry.create(makePod('staging', 'web'));
      registry.create(makePod('default', 'api'));

      expect(registry.podsByNamespace.value.get('default')).toEqual(['web', 'api']);
      expect(registry.podsByNamespace.value.get('staging')).toEqual(['web']);
    });
  });

  describe('clear', () => {
    it('should remove every pod', () => {
      registry.create(makePod('default', 'web'));
      registry.create(makePod('default', 'api'));

      registry.clear();

      expect(registry.list()).toEqual([]);
      expect(registry.podCount.value).toBe(0);
    });
  });

  describe('instances', () => {
    it('should keep separate tables per registry', () => {
      const other = new PodRegistry();
      registry.create(makePod('default', 'web'));

      expect(other.has('default', 'web')).toBe(false);
    });
  });
});
