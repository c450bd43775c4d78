import { Inject, Injectable, Logger } from '@nestjs/common';

import { APP_CONFIG } from '../config/app-config.js';
import type { AppConfig } from '../config/app-config.js';
import { AuthError, InvalidDateRangeError } from '../common/errors.js';
import { toIdentifier } from '../common/types.js';
import type { DateRange, ISO8601, RepoIdentifier, TrackedRepository } from '../common/types.js';
import { ReleaseFetcherService } from '../releases/release-fetcher.service.js';
import { parseRepositoryUrl } from '../releases/repo-url.js';
import { RepositoryRegistry } from '../registry/repository-registry.js';
import { buildTimeline } from '../timeline/timeline-builder.js';
import type { ChartSpec, TimelineStatistics } from '../timeline/types.js';

const DATE_ONLY_RE = /^\d{4}-\d{2}-\d{2}$/;
// time present, no zone designator: read as UTC, not server-local time
const ZONELESS_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?$/;
const ZONED_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;

export interface RepositorySummary {
  identifier: RepoIdentifier;
  owner: string;
  name: string;
  color: string;
  lane: number;
  releaseCount: number;
  fetchedAt: ISO8601;
}

function summarize(repo: TrackedRepository): RepositorySummary {
  return {
    identifier: repo.identifier,
    owner: repo.owner,
    name: repo.name,
    color: repo.color,
    lane: repo.lane,
    releaseCount: repo.releases.length,
    fetchedAt: repo.fetchedAt,
  };
}

/** True when YYYY-MM-DD names a real calendar day (no Feb 30 rollover) */
function isCalendarDate(day: string): boolean {
  const ts = Date.parse(`${day}T00:00:00.000Z`);
  return !Number.isNaN(ts) && new Date(ts).toISOString().slice(0, 10) === day;
}

/**
 * A date-only bound covers the whole UTC day: start at 00:00, end at
 * 23:59:59.999. A timestamp without a zone is taken as UTC.
 */
function parseBound(raw: string, edge: 'start' | 'end'): ISO8601 {
  const value = (raw ?? '').trim();
  const invalid = () => new InvalidDateRangeError(`Invalid ${edge} date: "${raw}"`);

  if (!isCalendarDate(value.slice(0, 10))) throw invalid();

  if (DATE_ONLY_RE.test(value)) {
    return `${value}T${edge === 'start' ? '00:00:00.000' : '23:59:59.999'}Z`;
  }

  let normalized: string;
  if (ZONELESS_RE.test(value)) normalized = `${value}Z`;
  else if (ZONED_RE.test(value)) normalized = value;
  else throw invalid();

  const ts = Date.parse(normalized);
  if (Number.isNaN(ts)) throw invalid();
  return new Date(ts).toISOString();
}

/**
 * State of the one interactive session: the token, the tracked
 * repositories and the active date range. Every operation either completes
 * or throws a TimelineError with the state left untouched.
 */
@Injectable()
export class TimelineSessionService {
  private readonly logger = new Logger(TimelineSessionService.name);
  private readonly registry: RepositoryRegistry;
  private token: string | null;
  private range: DateRange | null = null;

  constructor(
    @Inject(ReleaseFetcherService) private readonly fetcher: ReleaseFetcherService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {
    this.registry = new RepositoryRegistry(config.palette);
    this.token = config.githubToken;
  }

  private resolveToken(token?: string): string {
    const chosen = token?.trim() || this.token;
    if (!chosen) {
      throw new AuthError('No GitHub token: set one for the session or pass it with the request');
    }
    return chosen;
  }

  get hasToken(): boolean {
    return this.token !== null;
  }

  async setToken(token: string): Promise<{ login: string }> {
    const viewer = await this.fetcher.verifyToken(token);
    this.token = token.trim();
    return viewer;
  }

  async addRepository(url: string, token?: string): Promise<RepositorySummary> {
    const { owner, name } = parseRepositoryUrl(url, this.config.githubHost);
    const identifier = toIdentifier(owner, name);
    this.logger.log(`Parsed repository URL: ${identifier}`);

    // no fetch for a duplicate
    this.registry.ensureAbsent(identifier);

    const releases = await this.fetcher.fetchReleases(owner, name, this.resolveToken(token));
    const repo = this.registry.add(owner, name, releases);
    this.logger.log(`Added repository ${identifier} with ${releases.length} releases`);
    return summarize(repo);
  }

  removeRepository(identifier: RepoIdentifier): RepositorySummary {
    const removed = this.registry.remove(identifier);
    this.logger.log(`Removed repository ${identifier}`);
    return summarize(removed);
  }

  /** Re-fetch releases; on failure the previous releases are kept */
  async refreshRepository(identifier: RepoIdentifier, token?: string): Promise<RepositorySummary> {
    const current = this.registry.get(identifier);
    const releases = await this.fetcher.fetchReleases(
      current.owner,
      current.name,
      this.resolveToken(token),
    );
    const repo = this.registry.replaceReleases(identifier, releases);
    this.logger.log(`Refreshed ${identifier}: ${releases.length} releases`);
    return summarize(repo);
  }

  listRepositories(): RepositorySummary[] {
    return this.registry.list().map(summarize);
  }

  colorFor(identifier: RepoIdentifier): string {
    return this.registry.colorFor(identifier);
  }

  setDateRange(start: string, end: string): DateRange {
    const range = { start: parseBound(start, 'start'), end: parseBound(end, 'end') };
    if (Date.parse(range.start) > Date.parse(range.end)) {
      throw new InvalidDateRangeError('Start date must be before end date');
    }
    this.range = range;
    return { ...range };
  }

  clearDateRange(): void {
    this.range = null;
  }

  getDateRange(): DateRange | null {
    return this.range ? { ...this.range } : null;
  }

  getChartSpec(): ChartSpec {
    return buildTimeline(this.registry.list(), this.range);
  }

  getStatistics(): TimelineStatistics {
    return this.getChartSpec().statistics;
  }
}
