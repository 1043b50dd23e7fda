import type { ID } from '@/types/wardrobe';

export enum ErrorCode {
  InvalidFormat = 'InvalidFormat',
  UnsupportedVersion = 'UnsupportedVersion',
  MissingField = 'MissingField',
  NotFound = 'NotFound',
  PermissionDenied = 'PermissionDenied',
  WriteFailed = 'WriteFailed',
  UnknownComponentType = 'UnknownComponentType',
}

export interface WardrobeError {
  code: ErrorCode;
  message: string;
  /** Chemin pointé du champ fautif, ex. "components[2].dimensions.width" */
  field?: string;
}

/**
 * Outcome of every fallible operation. Errors are values: the calling shell decides
 * whether to prompt again; nothing here retries.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: WardrobeError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: ErrorCode, message: string, field?: string): Result<T> {
  return { ok: false, error: field === undefined ? { code, message } : { code, message, field } };
}

export type ProblemSeverity = 'BLOCK' | 'WARN';

export enum ProblemCode {
  overlap = 'overlap',
  outside_frame_interior = 'outside_frame_interior',
  drawer_heights_mismatch = 'drawer_heights_mismatch',
}

export interface Problem {
  code: ProblemCode;
  severity: ProblemSeverity;
  componentId: ID;
  otherId?: ID;
  message: string;
}
