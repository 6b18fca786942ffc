import { ConflictError } from '../errors';
import { getErrorCode, getErrorDetail } from '../../utils/errorUtils';

export type ConstraintErrorType = 'unique' | 'foreign_key' | 'exclusion' | 'lock_timeout' | null;

export function isConstraintError(error: unknown): { type: ConstraintErrorType, detail?: string } {
  const code = getErrorCode(error);
  const detail = getErrorDetail(error);
  if (code === '23505') return { type: 'unique', detail };
  if (code === '23503') return { type: 'foreign_key', detail };
  if (code === '23P01') return { type: 'exclusion', detail };
  if (code === '55P03') return { type: 'lock_timeout', detail };
  return { type: null };
}

/**
 * Contention the database caught on its own (the active-request index, the
 * booking exclusion constraint, a lock wait past lock_timeout) becomes a Conflict.
 * Everything else passes through untouched.
 */
export function translateStoreError(error: unknown): unknown {
  const { type, detail } = isConstraintError(error);
  switch (type) {
    case 'unique':
      return new ConflictError('Resource already has an active request', { detail });
    case 'exclusion':
      return new ConflictError('Time slot conflicts with an existing booking', { detail });
    case 'lock_timeout':
      return new ConflictError('Resource is busy with a concurrent operation, try again');
    default:
      return error;
  }
}
