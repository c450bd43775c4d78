import type { DateRange, HexColor, ISO8601, RepoIdentifier } from '../common/types.js';

export interface TooltipPayload {
  title: string;
  tag: string;
  publishedAt: ISO8601;
  excerpt: string;
  url: string;
}

/** One release on the chart: x is time, y is the repository's lane */
export interface TimelinePoint {
  identifier: RepoIdentifier;
  lane: number;
  x: ISO8601;
  y: RepoIdentifier;
  color: HexColor;
  label: string;
  tooltip: TooltipPayload;
}

export interface TimelineLane {
  identifier: RepoIdentifier;
  lane: number;
  color: HexColor;
}

export interface TimelineStatistics {
  totalReleases: number;                          // in the filtered set
  perRepository: Record<RepoIdentifier, number>;  // filtered, zeros included
  earliest: ISO8601 | null;
  latest: ISO8601 | null;
  repositoryCount: number;
  trackedReleases: number;                        // ignoring the range
}

/** Rendering-agnostic description of the timeline */
export interface ChartSpec {
  range: DateRange | null;
  lanes: TimelineLane[];
  points: TimelinePoint[];
  statistics: TimelineStatistics;
}
