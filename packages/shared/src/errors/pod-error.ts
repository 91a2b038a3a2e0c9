/**
 * Pod-specific error class
 * @module @vnode/shared/errors/pod-error
 */

import { ProviderError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Pod-specific error class
 */
export class PodError extends ProviderError {
  /** Namespace of the pod involved */
  public readonly namespace: string;
  /** Name of the pod involved */
  public readonly podName: string;

  constructor(
    message: string,
    code: ErrorCode,
    namespace: string,
    podName: string,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(
      message,
      code,
      {
        ...meta,
        resourceType: 'pod',
        resourceId: `${namespace}/${podName}`,
      },
      cause,
    );
    this.name = 'PodError';
    this.namespace = namespace;
    this.podName = podName;
  }

  /**
   * Create for a lookup on an absent identity
   */
  static notFound(namespace: string, name: string): PodError {
    return new PodError(
      `Pod "${name}" in namespace "${namespace}" not found`,
      ErrorCode.POD_NOT_FOUND,
      namespace,
      name,
    );
  }

  /**
   * Create for a create on a live identity
   */
  static alreadyExists(namespace: string, name: string): PodError {
    return new PodError(
      `Pod "${name}" in namespace "${namespace}" already exists`,
      ErrorCode.POD_ALREADY_EXISTS,
      namespace,
      name,
    );
  }

  /**
   * Create for a backend that failed to start the pod
   */
  static startFailed(namespace: string, name: string, cause?: Error): PodError {
    const reason = cause ? `: ${cause.message}` : '';
    return new PodError(
      `Pod "${name}" in namespace "${namespace}" failed to start${reason}`,
      ErrorCode.POD_START_FAILED,
      namespace,
      name,
      {},
      cause,
    );
  }

  /**
   * Create for a backend that failed to stop the pod
   */
  static stopFailed(namespace: string, name: string, cause?: Error): PodError {
    const reason = cause ? `: ${cause.message}` : '';
    return new PodError(
      `Pod "${name}" in namespace "${namespace}" failed to stop${reason}`,
      ErrorCode.POD_STOP_FAILED,
      namespace,
      name,
      {},
      cause,
    );
  }

  /**
   * Convert to JSON for API responses
   */
  override toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        namespace: this.namespace,
        podName: this.podName,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }
}

/**
 * Check if an error is a PodError
 */
export function isPodError(error: unknown): error is PodError {
  return error instanceof PodError;
}
