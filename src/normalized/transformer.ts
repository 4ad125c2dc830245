import type { RawCommit } from '../raw/github-client-interface.js';
import { mapCommit } from './mappers.js';
import type { Commit, Identity, NormalizedBundle, StableKey } from './types.js';

/**
 * Splits raw commit records into identities and commits. Identities are
 * keyed by stable key; the first fragment seen for a key wins, authors
 * before committers within a record.
 */
export function transformCommits(rawCommits: Iterable<RawCommit>): NormalizedBundle {
  const identities = new Map<StableKey, Identity>();
  const commits: Commit[] = [];
  let skipped = 0;

  const remember = (identity: Identity): StableKey => {
    if (!identities.has(identity.stableKey)) identities.set(identity.stableKey, identity);
    return identity.stableKey;
  };

  for (const raw of rawCommits) {
    const mapped = mapCommit(raw);
    if (!mapped) {
      skipped++;
      continue;
    }
    const { author, committer, ...rest } = mapped;
    commits.push({
      ...rest,
      authorKey: remember(author),
      committerKey: remember(committer),
    });
  }

  return { identities: [...identities.values()], commits, skipped };
}
