/**
 * Provisioner error utilities.
 *
 * Provides a consistent error type for every public surface and helpers to
 * convert lower-level transport failures into ProvisionerError instances
 * callers can reason about.
 */

import type { ZodError } from 'zod';
import type { CapabilityType } from '../types/capability.js';

/**
 * Error codes surfaced to callers.
 *
 * Fatal provisioning failures (UnsupportedModel, LoadTriggerFailed) abort the
 * whole ensure-ready call; RegistryQueryFailed is only raised when the
 * registry failure policy is `fatal`.
 */
export type ProvisionerErrorCode =
  | 'UnsupportedModel'
  | 'LoadTriggerFailed'
  | 'RegistryQueryFailed'
  | 'ServiceStartFailed'
  | 'HealthCheckFailed'
  | 'InvalidParams'
  | 'ConfigError'
  | 'TransportError'
  | 'Timeout'
  | 'UnknownError';

/**
 * Plain-object shape of a ProvisionerError (for JSON output and events).
 */
export interface ProvisionerErrorShape {
  code: ProvisionerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class ProvisionerError extends Error implements ProvisionerErrorShape {
  public readonly code: ProvisionerErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ProvisionerErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProvisionerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON responses/events).
   */
  public toObject(): ProvisionerErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * The registry explicitly excludes the model for its capability.
 */
export class UnsupportedModelError extends ProvisionerError {
  public readonly modelId: string;
  public readonly capability: CapabilityType;

  constructor(
    modelId: string,
    capability: CapabilityType,
    details: { task: string; registryUrl: string; supported: readonly string[] }
  ) {
    super(
      'UnsupportedModel',
      `Model '${modelId}' (type: ${details.task}) is not supported by the service registry. ` +
        `Check available models at ${details.registryUrl}`,
      { modelId, capability, ...details }
    );
    this.name = 'UnsupportedModelError';
    this.modelId = modelId;
    this.capability = capability;
  }
}

/**
 * The load/download request was rejected or never answered.
 */
export class LoadTriggerError extends ProvisionerError {
  public readonly modelId: string;
  public readonly capability: CapabilityType;
  public readonly status?: number;
  public readonly body?: string;

  constructor(
    modelId: string,
    capability: CapabilityType,
    details: { status?: number; body?: string; reason?: string },
    options?: { cause?: unknown }
  ) {
    const cause =
      details.status !== undefined
        ? `status code: ${details.status}, response: ${details.body ?? ''}`
        : details.reason ?? 'no response';
    super(
      'LoadTriggerFailed',
      `Failed to download/load model ${modelId} (${capability}), ${cause}`,
      { modelId, capability, ...details },
      options
    );
    this.name = 'LoadTriggerError';
    this.modelId = modelId;
    this.capability = capability;
    this.status = details.status;
    this.body = details.body;
  }
}

/**
 * The registry query produced nothing usable. Only thrown under the `fatal`
 * registry failure policy; the advisory policy logs and continues.
 */
export class RegistryQueryError extends ProvisionerError {
  public readonly capability: CapabilityType;

  constructor(capability: CapabilityType, message: string, details?: Record<string, unknown>) {
    super('RegistryQueryFailed', message, { capability, ...details });
    this.name = 'RegistryQueryError';
    this.capability = capability;
  }
}

/**
 * The managed service could not be started or never became healthy.
 */
export class ServiceStartError extends ProvisionerError {
  public readonly label: string;

  constructor(label: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('ServiceStartFailed', message, { label, ...details }, options);
    this.name = 'ServiceStartError';
    this.label = label;
  }
}

/**
 * Map unknown errors into ProvisionerError instances.
 *
 * @param error - Error thrown by fetch, execa or a collaborator
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toProvisionerError(
  error: unknown,
  fallbackCode: ProvisionerErrorCode = 'UnknownError'
): ProvisionerError {
  if (error instanceof ProvisionerError) {
    return error;
  }

  if (error instanceof Error) {
    // AbortSignal.timeout() rejects with a DOMException named TimeoutError
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return new ProvisionerError('Timeout', error.message || 'Request timed out', undefined, { cause: error });
    }

    if (/timeout|timed\s+out/i.test(error.message)) {
      return new ProvisionerError('Timeout', error.message, undefined, { cause: error });
    }

    return new ProvisionerError(fallbackCode, error.message, undefined, { cause: error });
  }

  return new ProvisionerError(fallbackCode, `Unknown provisioner error: ${String(error)}`);
}

/**
 * Human-readable message for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    // fetch() wraps socket failures; the useful text lives on the cause
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Convert Zod validation error to ProvisionerError
 *
 * @example
 * ```typescript
 * const result = ModelDescriptorSchema.safeParse({ modelId: '' });
 * if (!result.success) {
 *   throw zodErrorToProvisionerError(result.error);
 * }
 * // Throws: "Validation error on field 'modelId': Cannot be empty"
 * ```
 */
export function zodErrorToProvisionerError(error: ZodError): ProvisionerError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'Invalid value'}`;

  return new ProvisionerError('InvalidParams', message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
