import { realpath } from 'fs/promises';
import * as path from 'path';
import { createActionableError } from '../types.ts';
import type { ResolvedPath } from './types.ts';

/**
 * True when `child` is `parent` itself or lies below it.
 * Compares path segments, so `/srv/files-secret` is not within `/srv/files`.
 */
export function isWithin(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === '') return true;
  if (path.isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`);
}

// Follows symlinks when the target exists; otherwise the lexical path is kept and
// opening it reports the failure.
async function canonicalize(target: string): Promise<string> {
  try {
    return await realpath(target);
  } catch (_error) {
    return target;
  }
}

/**
 * Resolve an untrusted file name against the root directory
 *
 * The name is joined under the root (a leading separator does not make it
 * absolute), `.` and `..` segments are normalized away, and the result is
 * canonicalized. Anything that does not end up at or below the canonical root
 * is rejected with PATH_ESCAPE.
 *
 * @example
 * await resolveRequestPath('/srv/files', 'reports/q1.pdf')
 * // => { type: 'resolved', path: '/srv/files/reports/q1.pdf' }
 *
 * @example
 * await resolveRequestPath('/srv/files', '../files-secret/key.pem')
 * // => { type: 'error', code: 'PATH_ESCAPE', error: 'Invalid file path' }
 */
export async function resolveRequestPath(rootDir: string, requestedName: string): Promise<ResolvedPath> {
  if (!requestedName) {
    return createActionableError('File name is required', 'INVALID_INPUT', 'Pass the file name as ?file=<name>');
  }
  if (requestedName.includes('\0')) {
    return createActionableError('File name contains invalid characters', 'INVALID_INPUT');
  }

  const root = await canonicalize(path.resolve(rootDir));
  const joined = path.join(root, requestedName);
  if (!isWithin(joined, root)) {
    return createActionableError('Invalid file path', 'PATH_ESCAPE');
  }

  const canonical = await canonicalize(joined);
  if (!isWithin(canonical, root)) {
    return createActionableError('Invalid file path', 'PATH_ESCAPE');
  }

  return { type: 'resolved', path: canonical };
}
