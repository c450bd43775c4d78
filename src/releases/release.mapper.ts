import type { ISO8601, Release } from '../common/types.js';
import type { GithubReleaseDTO } from './release-client.interface.js';

/** Ascending publishedAt, then ascending tag (code-unit order) */
export function compareReleases(a: Release, b: Release): number {
  const byTime = Date.parse(a.publishedAt) - Date.parse(b.publishedAt);
  if (byTime !== 0) return byTime;
  if (a.tag === b.tag) return 0;
  return a.tag < b.tag ? -1 : 1;
}

/** Null for drafts and for records without a usable publish timestamp */
export function normalizeRelease(dto: GithubReleaseDTO): Release | null {
  if (dto.draft || !dto.publishedAt) return null;
  const ts = Date.parse(dto.publishedAt);
  if (Number.isNaN(ts)) return null;

  const publishedAt: ISO8601 = new Date(ts).toISOString();
  const name = dto.name?.trim();
  return {
    tag: dto.tagName,
    title: name ? name : dto.tagName,
    publishedAt,
    body: dto.body ?? '',
    url: dto.htmlUrl,
  };
}
