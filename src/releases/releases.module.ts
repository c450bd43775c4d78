import { Module } from '@nestjs/common';
import { ReleaseFetcherService } from './release-fetcher.service.js';
import { RELEASE_CLIENT } from './release-client.token.js';
import { OctokitReleaseClient } from './octokit-release.client.js';

@Module({
  providers: [
    ReleaseFetcherService,
    { provide: RELEASE_CLIENT, useClass: OctokitReleaseClient },
  ],
  exports: [ReleaseFetcherService],
})
export class ReleasesModule {}
