export type HttpError = Error & { status: number; code: string };

export function httpError(status: number, code: string, message: string): HttpError {
  return Object.assign(new Error(message), { status, code });
}

export function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : 500;
  }
  return 500;
}

// body-parser errors carry a status but no code of ours
export function codeOf(err: unknown, status = statusOf(err)): string {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
}
