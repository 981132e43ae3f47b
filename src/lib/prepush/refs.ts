/**
 * Parsing of the ref-update lines git writes to a pre-push hook's stdin
 */

import type { RefUpdate, RefUpdateKind } from './types.js';

/**
 * Object names made only of zeros stand for "no object" (SHA-1 or SHA-256)
 */
export function isNullSha(sha: string): boolean {
  return /^0+$/.test(sha) && (sha.length === 40 || sha.length === 64);
}

function classify(localSha: string, remoteSha: string): RefUpdateKind {
  if (isNullSha(localSha)) return 'delete';
  if (isNullSha(remoteSha)) return 'create';
  return 'update';
}

/**
 * Parse a single line. Returns null for anything that is not four fields
 * with hex object names.
 */
export function parseRefUpdateLine(line: string): RefUpdate | null {
  const fields = line.trim().split(/\s+/);
  if (fields.length !== 4) {
    return null;
  }

  const [localRef, localSha, remoteRef, remoteSha] = fields;
  if (!/^[0-9a-f]+$/i.test(localSha) || !/^[0-9a-f]+$/i.test(remoteSha)) {
    return null;
  }

  return {
    localRef,
    localSha,
    remoteRef,
    remoteSha,
    kind: classify(localSha, remoteSha),
  };
}

/**
 * Parse the whole of stdin. Blank lines are ignored; malformed lines are
 * returned separately so the caller can log them.
 */
export function parseRefUpdates(text: string): { refs: RefUpdate[]; malformed: string[] } {
  const refs: RefUpdate[] = [];
  const malformed: string[] = [];

  for (const line of text.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const parsed = parseRefUpdateLine(line);
    if (parsed) {
      refs.push(parsed);
    } else {
      malformed.push(line);
    }
  }

  return { refs, malformed };
}

/**
 * One-line summary for debug logs
 */
export function describeRefUpdate(ref: RefUpdate): string {
  switch (ref.kind) {
    case 'delete':
      return `delete ${ref.remoteRef}`;
    case 'create':
      return `create ${ref.remoteRef} at ${ref.localSha.slice(0, 7)}`;
    default:
      return `${ref.localRef} -> ${ref.remoteRef} (${ref.remoteSha.slice(0, 7)}..${ref.localSha.slice(0, 7)})`;
  }
}
