import { Inject, Injectable, Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';

import { APP_CONFIG } from '../config/app-config.js';
import type { AppConfig } from '../config/app-config.js';
import type {
  ReleaseClient,
  GithubReleaseDTO,
  GithubViewerDTO,
} from './release-client.interface.js';

type ReleaseListParams =
  RestEndpointMethodTypes['repos']['listReleases']['parameters'];

type ReleaseItem =
  RestEndpointMethodTypes['repos']['listReleases']['response']['data'][number];

@Injectable()
export class OctokitReleaseClient implements ReleaseClient {
  private readonly logger = new Logger(OctokitReleaseClient.name);
  // only the most recent token keeps an instance; an override replaces it
  private cached: { token: string; client: Octokit } | null = null;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  private octokitFor(token: string): Octokit {
    if (this.cached?.token === token) return this.cached.client;

    const client = new Octokit({
      auth: token,
      baseUrl: this.config.githubApiUrl,
      userAgent: 'release-timeline/1.0',
      request: { headers: { accept: 'application/vnd.github+json' } },
    });
    this.cached = { token, client };
    this.logger.debug(`Octokit client created for ${this.config.githubApiUrl}`);
    return client;
  }

  // ---------- RELEASES ----------
  async listReleasesPage(params: {
    owner: string;
    repo: string;
    token: string;
    page: number;
    perPage: number;
  }): Promise<GithubReleaseDTO[]> {
    const { data } = await this.octokitFor(params.token).repos.listReleases({
      owner: params.owner,
      repo: params.repo,
      per_page: params.perPage,
      page: params.page,
    } satisfies ReleaseListParams);

    return data.map(
      (r: ReleaseItem): GithubReleaseDTO => ({
        tagName: r.tag_name,
        name: r.name ?? null,
        draft: Boolean(r.draft),
        publishedAt: r.published_at ?? null,
        body: r.body ?? null,
        htmlUrl: r.html_url,
      }),
    );
  }

  // ---------- USERS ----------
  async getAuthenticatedUser(params: { token: string }): Promise<GithubViewerDTO> {
    const { data } = await this.octokitFor(params.token).users.getAuthenticated();
    return { login: data.login };
  }
}
