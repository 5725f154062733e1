// Maps axios failures onto dependency failure kinds
import axios from 'axios';
import { DependencyFailureError, errorMessage, type FailureKind } from '@/core/errors';

export function failureKindForStatus(status: number): FailureKind {
  if (status === 429) return 'rate_limit';
  if (status === 404 || status === 410) return 'not_found';
  if (status === 401 || status === 403 || status === 451) return 'blocked';
  return 'error';
}

export function toDependencyError(dependency: string, err: unknown): DependencyFailureError {
  if (err instanceof DependencyFailureError) return err;
  if (axios.isAxiosError(err)) {
    if (err.response) {
      const kind = failureKindForStatus(err.response.status);
      return new DependencyFailureError(dependency, kind, `HTTP ${err.response.status}`, { cause: err });
    }
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return new DependencyFailureError(dependency, 'timeout', err.message, { cause: err });
    }
  }
  return new DependencyFailureError(dependency, 'error', errorMessage(err), { cause: err });
}

export function isRateLimited(err: unknown): boolean {
  return err instanceof DependencyFailureError && err.kind === 'rate_limit';
}
