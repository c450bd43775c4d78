// Abstraction over the GitHub REST API used by ReleaseFetcherService

/** Release fields as GitHub returns them; only the fetcher reads these */
export interface GithubReleaseDTO {
  tagName: string;
  name: string | null;
  draft: boolean;
  publishedAt: string | null;
  body: string | null;
  htmlUrl: string;
}

export interface GithubViewerDTO {
  login: string;
}

export interface ReleaseClient {
  listReleasesPage(params: {
    owner: string;
    repo: string;
    token: string;
    page: number;
    perPage: number;
  }): Promise<GithubReleaseDTO[]>;

  getAuthenticatedUser(params: { token: string }): Promise<GithubViewerDTO>;
}
