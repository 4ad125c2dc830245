import type { RawAccount, RawCommit, RawGitSignature } from '../raw/github-client-interface.js';
import type { Commit, ISO8601, Identity } from './types.js';

export const UNKNOWN_IDENTITY = 'Unknown';

export type MappedCommit = Omit<Commit, 'authorKey' | 'committerKey'> & {
  author: Identity;
  committer: Identity;
};

/** Blank strings count as absent */
function present(value: string | null | undefined): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function timestamp(value: string | null | undefined): ISO8601 | null {
  const v = present(value);
  return v !== null && !Number.isNaN(Date.parse(v)) ? v : null;
}

export function mapIdentity(
  account: RawAccount | null | undefined,
  signature: RawGitSignature | null | undefined,
): Identity {
  const login = present(account?.login);
  const name = present(signature?.name);
  const email = present(signature?.email);
  return {
    stableKey: login ?? name ?? email ?? UNKNOWN_IDENTITY,
    login,
    name,
    email,
  };
}

/* ---------- Commits ---------- */
export function mapCommit(raw: RawCommit): MappedCommit | null {
  const sha = present(raw.sha);
  const authoredAt = timestamp(raw.commit?.author?.date);
  const committedAt = timestamp(raw.commit?.committer?.date);
  if (sha === null || authoredAt === null || committedAt === null) return null;

  return {
    sha,
    authoredAt,
    committedAt,
    message: raw.commit?.message ?? null,
    author: mapIdentity(raw.author, raw.commit?.author),
    committer: mapIdentity(raw.committer, raw.commit?.committer),
  };
}
