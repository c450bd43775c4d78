export type ISO8601 = string;  // e.g. "2025-09-08T12:34:56.000Z"
export type RepoIdentifier = string;  // "owner/name"
export type HexColor = string;

/** One published release, normalized at the fetch boundary */
export interface Release {
  tag: string;
  title: string;           // release name, or the tag when the name is empty
  publishedAt: ISO8601;    // never null past the fetcher
  body: string;
  url: string;             // html_url
}

export interface RepoCoordinates {
  owner: string;
  name: string;
}

export interface TrackedRepository extends RepoCoordinates {
  identifier: RepoIdentifier;
  color: HexColor;
  lane: number;            // per-session sequence, never renumbered
  releases: Release[];
  fetchedAt: ISO8601;
}

/** Inclusive on both ends */
export interface DateRange {
  start: ISO8601;
  end: ISO8601;
}

export const toIdentifier = (owner: string, name: string): RepoIdentifier =>
  `${owner}/${name}`;
