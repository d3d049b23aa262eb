/**
 * Modelsync Transfer - Errors
 */

import { errorMessage } from '@modelsync/shared';
import { isRetryableError } from '@modelsync/ai-gateway';

export type TransferErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'DESTINATION_EXISTS'
  | 'NOT_REGISTRY_BACKED'
  | 'NETWORK'
  | 'VERIFICATION_FAILED'
  | 'INVALID_ENDPOINT';

export class TransferError extends Error {
  readonly code: TransferErrorCode;
  readonly retryable: boolean;

  constructor(code: TransferErrorCode, message: string, retryable = false, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TransferError';
    this.code = code;
    this.retryable = retryable;
  }
}

export class SourceNotFoundError extends TransferError {
  constructor(model: string, where: string) {
    super('SOURCE_NOT_FOUND', `Source model ${model} not found on ${where}`);
    this.name = 'SourceNotFoundError';
  }
}

export class DestinationAlreadyExistsError extends TransferError {
  constructor(model: string, where: string) {
    super('DESTINATION_EXISTS', `Destination model ${model} already exists on ${where}`);
    this.name = 'DestinationAlreadyExistsError';
  }
}

export class SourceNotEligibleError extends TransferError {
  constructor(model: string, detail: string) {
    super(
      'NOT_REGISTRY_BACKED',
      `${model} cannot be copied server to server: ${detail}. Pull it locally and copy from there instead.`
    );
    this.name = 'SourceNotEligibleError';
  }
}

export class NetworkError extends TransferError {
  constructor(message: string, cause?: unknown) {
    super('NETWORK', message, true, cause);
    this.name = 'NetworkError';
  }
}

export class VerificationFailedError extends TransferError {
  constructor(message: string) {
    super('VERIFICATION_FAILED', message);
    this.name = 'VerificationFailedError';
  }
}

export class InvalidEndpointError extends TransferError {
  constructor(reference: string, detail: string) {
    super('INVALID_ENDPOINT', `Invalid model reference "${reference}": ${detail}`);
    this.name = 'InvalidEndpointError';
  }
}

/**
 * Wrap transport failures as retryable NetworkErrors; leave everything else intact
 */
export function toTransferError(error: unknown, context: string): Error {
  if (error instanceof TransferError) return error;
  if (isRetryableError(error)) {
    return new NetworkError(`${context}: ${errorMessage(error)}`, error);
  }
  return error instanceof Error ? error : new Error(`${context}: ${errorMessage(error)}`);
}
