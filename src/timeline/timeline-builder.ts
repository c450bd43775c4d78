import type { DateRange, Release, TrackedRepository } from '../common/types.js';
import { compareReleases } from '../releases/release.mapper.js';
import type { ChartSpec, TimelinePoint, TimelineStatistics } from './types.js';

export const EXCERPT_LENGTH = 200;

export function excerpt(body: string, max = EXCERPT_LENGTH): string {
  const text = body.trim();
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function inRange(release: Release, range: { startMs: number; endMs: number } | null): boolean {
  if (!range) return true;
  const ts = Date.parse(release.publishedAt);
  return range.startMs <= ts && ts <= range.endMs;
}

/**
 * Build the chart description for the given repositories. Pure: inputs are
 * not mutated and the same inputs always give a deep-equal result.
 *
 * Without a range every release is included and the reported range spans
 * the earliest to the latest release (null when there are none).
 */
export function buildTimeline(
  repositories: readonly TrackedRepository[],
  range?: DateRange | null,
): ChartSpec {
  const bounds = range
    ? { startMs: Date.parse(range.start), endMs: Date.parse(range.end) }
    : null;

  const points: TimelinePoint[] = [];
  const perRepository: TimelineStatistics['perRepository'] = {};
  let earliestMs = Infinity;
  let latestMs = -Infinity;
  let trackedReleases = 0;

  for (const repo of repositories) {
    trackedReleases += repo.releases.length;
    const included = repo.releases.filter((r) => inRange(r, bounds)).sort(compareReleases);
    perRepository[repo.identifier] = included.length;

    for (const release of included) {
      const ts = Date.parse(release.publishedAt);
      earliestMs = Math.min(earliestMs, ts);
      latestMs = Math.max(latestMs, ts);

      points.push({
        identifier: repo.identifier,
        lane: repo.lane,
        x: release.publishedAt,
        y: repo.identifier,
        color: repo.color,
        label: release.tag,
        tooltip: {
          title: release.title,
          tag: release.tag,
          publishedAt: release.publishedAt,
          excerpt: excerpt(release.body),
          url: release.url,
        },
      });
    }
  }

  const earliest = points.length ? new Date(earliestMs).toISOString() : null;
  const latest = points.length ? new Date(latestMs).toISOString() : null;

  return {
    range: range
      ? { start: range.start, end: range.end }
      : earliest && latest
        ? { start: earliest, end: latest }
        : null,
    lanes: repositories.map((r) => ({ identifier: r.identifier, lane: r.lane, color: r.color })),
    points,
    statistics: {
      totalReleases: points.length,
      perRepository,
      earliest,
      latest,
      repositoryCount: repositories.length,
      trackedReleases,
    },
  };
}
