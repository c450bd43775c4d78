import { Logger } from '@nestjs/common';

import { DuplicateError, NotFoundError } from '../common/errors.js';
import { toIdentifier } from '../common/types.js';
import type {
  HexColor,
  ISO8601,
  Release,
  RepoIdentifier,
  TrackedRepository,
} from '../common/types.js';

const keyOf = (identifier: RepoIdentifier) => identifier.toLowerCase();

/**
 * Ordered set of tracked repositories for one session.
 *
 * Colors are assigned as `palette[count % palette.length]`, where `count` is
 * the number of repositories tracked at insertion time. A color never changes
 * once assigned, and freed colors are not recycled: after removing the 2nd of
 * 3 repositories the next add receives palette[2] again. Lanes come from a
 * separate counter that only grows, so a repository keeps its lane for the
 * whole session.
 *
 * Identifiers are matched case-insensitively, as GitHub does; the casing of
 * the first add is the one displayed.
 */
export class RepositoryRegistry {
  private readonly logger = new Logger(RepositoryRegistry.name);
  private readonly repos = new Map<RepoIdentifier, TrackedRepository>();
  private nextLane = 0;

  constructor(private readonly palette: readonly HexColor[]) {
    if (palette.length === 0) throw new Error('Palette must contain at least one color');
  }

  get size(): number {
    return this.repos.size;
  }

  has(identifier: RepoIdentifier): boolean {
    return this.repos.has(keyOf(identifier));
  }

  get(identifier: RepoIdentifier): TrackedRepository {
    const repo = this.repos.get(keyOf(identifier));
    if (!repo) throw new NotFoundError(`Repository ${identifier} is not tracked`);
    return repo;
  }

  /** Throws DuplicateError when the identifier is already tracked */
  ensureAbsent(identifier: RepoIdentifier): void {
    const existing = this.repos.get(keyOf(identifier));
    if (existing) {
      throw new DuplicateError(`${existing.identifier} is already added`);
    }
  }

  nextColor(): HexColor {
    return this.palette[this.repos.size % this.palette.length];
  }

  add(
    owner: string,
    name: string,
    releases: Release[],
    fetchedAt: ISO8601 = new Date().toISOString(),
  ): TrackedRepository {
    const identifier = toIdentifier(owner, name);
    this.ensureAbsent(identifier);

    const repo: TrackedRepository = {
      owner,
      name,
      identifier,
      color: this.nextColor(),
      lane: this.nextLane++,
      releases: [...releases],
      fetchedAt,
    };
    this.repos.set(keyOf(identifier), repo);
    this.logger.debug(`Assigned color ${repo.color} and lane ${repo.lane} to ${identifier}`);
    return repo;
  }

  remove(identifier: RepoIdentifier): TrackedRepository {
    const repo = this.get(identifier);
    this.repos.delete(keyOf(identifier));
    return repo;
  }

  /** Swap in a fresh release list; color and lane stay as they were */
  replaceReleases(
    identifier: RepoIdentifier,
    releases: Release[],
    fetchedAt: ISO8601 = new Date().toISOString(),
  ): TrackedRepository {
    const current = this.get(identifier);
    const updated: TrackedRepository = { ...current, releases: [...releases], fetchedAt };
    this.repos.set(keyOf(identifier), updated);
    return updated;
  }

  /** Insertion order */
  list(): TrackedRepository[] {
    return Array.from(this.repos.values());
  }

  colorFor(identifier: RepoIdentifier): HexColor {
    return this.get(identifier).color;
  }
}
