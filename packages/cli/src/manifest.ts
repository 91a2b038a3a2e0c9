/**
 * Pod manifests
 *
 * A manifest is a JSON array of pods (a single pod object is also accepted).
 * @module @vnode/cli/manifest
 */

import * as fs from 'node:fs';
import {
  ValidationError,
  isPodError,
  isValidPod,
  validatePod,
  type Pod,
  type PodRecord,
  type ValidationErrorDetail,
} from '@vnode/shared';
import type { PodRegistry } from '@vnode/core';

/**
 * Pods read from a manifest, with the problems of the entries left out
 */
export interface ParsedManifest {
  pods: Pod[];
  problems: ValidationErrorDetail[];
}

/**
 * Turns ISO timestamps back into dates; invalid ones stay strings so
 * validation reports them
 */
function reviveTimestamps(key: string, value: unknown): unknown {
  if (key === 'creationTimestamp' && typeof value === 'string') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? value : date;
  }
  return value;
}

/**
 * Parses manifest content. Invalid entries are reported, not returned.
 */
export function parseManifest(content: string): ParsedManifest {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content, reviveTimestamps);
  } catch (err) {
    throw new ValidationError('Manifest is not valid JSON', [
      { field: 'manifest', message: err instanceof Error ? err.message : String(err), rule: 'format' },
    ]);
  }

  const entries: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const pods: Pod[] = [];
  const problems: ValidationErrorDetail[] = [];

  entries.forEach((entry, index) => {
    if (isValidPod(entry)) {
      pods.push(entry);
      return;
    }

    for (const detail of validatePod(entry).errors) {
      problems.push({ ...detail, field: `[${index}].${detail.field}` });
    }
  });

  return { pods, problems };
}

/**
 * Reads and parses a manifest file
 */
export function loadManifest(filePath: string): ParsedManifest {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Manifest not found: ${filePath}`, [
      { field: 'manifest', message: 'File does not exist', rule: 'exists', received: filePath },
    ]);
  }

  return parseManifest(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Registers pods in order. Pods whose identity is already taken are
 * reported instead of registered.
 */
export function registerPods(
  registry: PodRegistry,
  pods: Pod[],
): { records: PodRecord[]; problems: ValidationErrorDetail[] } {
  const records: PodRecord[] = [];
  const problems: ValidationErrorDetail[] = [];

  for (const pod of pods) {
    try {
      records.push(registry.create(pod));
    } catch (err) {
      if (!isPodError(err) || !err.isAlreadyExists()) {
        throw err;
      }
      problems.push({
        field: 'metadata.name',
        message: err.message,
        rule: 'unique',
        received: `${pod.metadata.namespace}/${pod.metadata.name}`,
      });
    }
  }

  return { records, problems };
}
