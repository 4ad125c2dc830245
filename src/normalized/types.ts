export type ISO8601 = string; // e.g. "2024-01-01T10:00:00Z"

/** login, else name, else email, else "Unknown" */
export type StableKey = string;

export interface Identity {
  stableKey: StableKey;
  login: string | null;
  name: string | null;
  email: string | null;
}

export interface Commit {
  sha: string;
  authorKey: StableKey;
  committerKey: StableKey;
  authoredAt: ISO8601;
  committedAt: ISO8601;
  message: string | null;
}

/** Output of the transform stage, input of the load stage */
export interface NormalizedBundle {
  /** Deduplicated by stable key, in first-seen order */
  identities: Identity[];
  /** Input order; may still repeat a sha */
  commits: Commit[];
  /** Raw records dropped for lacking a sha or a date */
  skipped: number;
}
