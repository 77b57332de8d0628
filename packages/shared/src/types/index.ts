/**
 * Shared type definitions
 */

// ============================================================================
// Result Types
// ============================================================================

/** Success or failure of an operation that does not throw */
export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning' | 'error';

/** Per-record warning surfaced to the user instead of aborting a batch */
export interface RecordWarning {
  code: string;
  message: string;
  severity: WarningSeverity;
  row?: number; // 0-based data row index
  context?: Record<string, unknown>;
}

// ============================================================================
// Result creators
// ============================================================================

/** Wrap a value as a successful result */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/** Wrap an error as a failed result */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}
