import { Inject, Injectable, Logger } from '@nestjs/common';

import { APP_CONFIG } from '../config/app-config.js';
import type { AppConfig } from '../config/app-config.js';
import { AuthError } from '../common/errors.js';
import { toIdentifier } from '../common/types.js';
import type { Release } from '../common/types.js';
import { RELEASE_CLIENT } from './release-client.token.js';
import type { GithubReleaseDTO, ReleaseClient } from './release-client.interface.js';
import { toTimelineError } from './release-errors.js';
import { compareReleases, normalizeRelease } from './release.mapper.js';

@Injectable()
export class ReleaseFetcherService {
  private readonly logger = new Logger(ReleaseFetcherService.name);

  constructor(
    @Inject(RELEASE_CLIENT) private readonly client: ReleaseClient,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  private requireToken(token: string): string {
    const trimmed = (token ?? '').trim();
    if (!trimmed) throw new AuthError('A GitHub token is required');
    return trimmed;
  }

  /**
   * Fetch every published release of owner/name, oldest first.
   * Pages are requested until one comes back short or empty. If any page
   * fails the whole fetch fails: no partial result is returned.
   */
  async fetchReleases(owner: string, name: string, token: string): Promise<Release[]> {
    const auth = this.requireToken(token);
    const identifier = toIdentifier(owner, name);
    const perPage = this.config.releasesPageSize;

    const raw: GithubReleaseDTO[] = [];
    for (let page = 1; ; page++) {
      let items: GithubReleaseDTO[];
      try {
        items = await this.client.listReleasesPage({ owner, repo: name, token: auth, page, perPage });
      } catch (error: unknown) {
        const mapped = toTimelineError(error, identifier);
        this.logger.warn(
          `Fetching releases for ${identifier} failed on page ${page} (${mapped.code}): ${mapped.message}`,
        );
        throw mapped;
      }
      raw.push(...items);
      if (items.length < perPage) break;
    }

    const releases = raw
      .map(normalizeRelease)
      .filter((r): r is Release => r !== null)
      .sort(compareReleases);

    const skipped = raw.length - releases.length;
    this.logger.log(
      `Fetched ${releases.length} releases for ${identifier}` +
        (skipped ? ` (${skipped} drafts/unpublished skipped)` : ''),
    );
    return releases;
  }

  /** Check a token against GET /user and return the account login */
  async verifyToken(token: string): Promise<{ login: string }> {
    const auth = this.requireToken(token);
    try {
      const viewer = await this.client.getAuthenticatedUser({ token: auth });
      this.logger.log(`GitHub authentication successful for ${viewer.login}`);
      return { login: viewer.login };
    } catch (error: unknown) {
      const mapped = toTimelineError(error, 'token');
      this.logger.warn(`GitHub authentication failed (${mapped.code}): ${mapped.message}`);
      throw mapped;
    }
  }
}
