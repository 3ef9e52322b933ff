import { z } from 'zod';

export enum ErrorCode {
  E_SLOT_INVALID = 'E_SLOT_INVALID',
  E_SLOT_CONFLICT = 'E_SLOT_CONFLICT',
  E_INPUT_MALFORMED = 'E_INPUT_MALFORMED',
  E_STORAGE_UNAVAILABLE = 'E_STORAGE_UNAVAILABLE',
  E_INTERNAL = 'E_INTERNAL',
}

/**
 * Coarse failure category a caller can branch on without reading messages.
 */
export const FailureKind = z.enum(['validation', 'conflict', 'malformed_input', 'storage', 'internal']);
export type FailureKind = z.infer<typeof FailureKind>;

export const SchedulingErrorJson = z.object({
  code: z.nativeEnum(ErrorCode),
  kind: FailureKind,
  message: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export type SchedulingErrorJson = z.infer<typeof SchedulingErrorJson>;

export class VoiceDeskError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly kind: FailureKind,
    message: string,
    public readonly metadata?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'VoiceDeskError';
  }

  toJSON(): SchedulingErrorJson {
    return {
      code: this.code,
      kind: this.kind,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

export class SlotValidationError extends VoiceDeskError {
  constructor(
    message: string,
    public readonly rule: string,
  ) {
    super(ErrorCode.E_SLOT_INVALID, 'validation', message, { rule });
    this.name = 'SlotValidationError';
  }
}

export class SlotConflictError extends VoiceDeskError {
  constructor(
    public readonly start: string,
    public readonly end: string,
  ) {
    super(ErrorCode.E_SLOT_CONFLICT, 'conflict', 'Time slot is not available', { start, end });
    this.name = 'SlotConflictError';
  }
}

export class MalformedInputError extends VoiceDeskError {
  constructor(detail: string, metadata?: Record<string, unknown>) {
    super(ErrorCode.E_INPUT_MALFORMED, 'malformed_input', `Failed to schedule meeting: ${detail}`, metadata);
    this.name = 'MalformedInputError';
  }
}

export class StorageError extends VoiceDeskError {
  constructor(
    public readonly operation: 'read' | 'write',
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(
      ErrorCode.E_STORAGE_UNAVAILABLE,
      'storage',
      'Meeting storage is unavailable, please try again later',
      {
        operation,
        filePath,
        reason: cause instanceof Error ? cause.message : cause === undefined ? undefined : String(cause),
      },
    );
    this.name = 'StorageError';
  }
}

export class InternalSchedulingError extends VoiceDeskError {
  constructor(cause: unknown) {
    super(
      ErrorCode.E_INTERNAL,
      'internal',
      `Failed to schedule meeting: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'InternalSchedulingError';
  }
}

export function isVoiceDeskError(error: unknown): error is VoiceDeskError {
  return error instanceof VoiceDeskError;
}
