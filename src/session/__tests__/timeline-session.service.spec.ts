import {
  AuthError,
  DuplicateError,
  InvalidDateRangeError,
  NotFoundError,
  ParseError,
  TransientNetworkError,
} from '../../common/errors.js';
import type { AppConfig } from '../../config/app-config.js';
import { ReleaseFetcherService } from '../../releases/release-fetcher.service.js';
import {
  FakeReleaseClient,
  githubError,
  releaseDto,
  testConfig,
} from '../../releases/__tests__/fake-release-client.js';
import { TimelineSessionService } from '../timeline-session.service.js';

const buildSession = (client: FakeReleaseClient, overrides: Partial<AppConfig> = {}) => {
  const config = testConfig({ releasesPageSize: 100, ...overrides });
  return new TimelineSessionService(new ReleaseFetcherService(client, config), config);
};

const url = (name: string) => `https://github.com/octo/${name}`;

describe('TimelineSessionService', () => {
  let client: FakeReleaseClient;

  beforeEach(() => {
    client = new FakeReleaseClient()
      .setPages('octo/api', [[
        releaseDto('api-2', '2024-03-10T12:00:00Z'),
        releaseDto('api-1', '2024-01-10T12:00:00Z'),
      ]])
      .setPages('octo/web', [[releaseDto('web-1', '2024-02-01T12:00:00Z')]])
      .setPages('octo/docs', [[]])
      .setPages('octo/cli', [[releaseDto('cli-1', '2024-02-20T00:00:00Z')]]);
  });

  describe('addRepository', () => {
    it('parses the URL, fetches releases and tracks the repository', async () => {
      const session = buildSession(client);

      const summary = await session.addRepository('https://github.com/octo/api.git');

      expect(summary).toEqual({
        identifier: 'octo/api',
        owner: 'octo',
        name: 'api',
        color: '#111111',
        lane: 0,
        releaseCount: 2,
        fetchedAt: expect.any(String),
      });
      expect(client.calls[0]).toMatchObject({ owner: 'octo', repo: 'api', token: 'test-token' });
    });

    it('tracks a repository with zero releases', async () => {
      const session = buildSession(client);

      await expect(session.addRepository(url('docs'))).resolves.toMatchObject({ releaseCount: 0 });
      expect(session.listRepositories().map((r) => r.identifier)).toEqual(['octo/docs']);
    });

    it('rejects a duplicate without calling GitHub again', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));

      await expect(session.addRepository(`${url('api')}/`)).rejects.toBeInstanceOf(DuplicateError);
      expect(client.calls).toHaveLength(1);
      expect(session.listRepositories()).toHaveLength(1);
    });

    it('treats owner and name casing as the same repository', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));

      await expect(session.addRepository('https://github.com/Octo/API')).rejects.toThrow(
        new DuplicateError('octo/api is already added'),
      );
      expect(client.calls).toHaveLength(1);

      session.removeRepository('OCTO/api');
      expect(session.listRepositories()).toEqual([]);
    });

    it('rejects a malformed URL before any network call', async () => {
      const session = buildSession(client);

      await expect(session.addRepository('github.com/octo')).rejects.toBeInstanceOf(ParseError);
      expect(client.calls).toHaveLength(0);
    });

    it('needs a token from the session or the request', async () => {
      const session = buildSession(client, { githubToken: null });

      await expect(session.addRepository(url('api'))).rejects.toBeInstanceOf(AuthError);
      expect(client.calls).toHaveLength(0);

      await session.addRepository(url('api'), 'request-token');
      expect(client.calls[0].token).toBe('request-token');
    });

    it('leaves the session unchanged when the fetch fails', async () => {
      const session = buildSession(client);

      await expect(session.addRepository(url('missing'))).rejects.toBeInstanceOf(NotFoundError);
      expect(session.listRepositories()).toEqual([]);
    });
  });

  describe('removeRepository', () => {
    it('fails on an unknown identifier and keeps the list', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));

      expect(() => session.removeRepository('octo/unknown')).toThrow(NotFoundError);
      expect(session.listRepositories().map((r) => r.identifier)).toEqual(['octo/api']);
    });

    it('keeps colors of the others and gives the next add the color at the current count', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));
      await session.addRepository(url('web'));
      await session.addRepository(url('docs'));

      session.removeRepository('octo/web');
      await session.addRepository(url('cli'));

      expect(session.listRepositories().map((r) => [r.identifier, r.color])).toEqual([
        ['octo/api', '#111111'],
        ['octo/docs', '#333333'],
        ['octo/cli', '#333333'],
      ]);
      expect(session.colorFor('octo/cli')).toBe('#333333');
    });
  });

  describe('refreshRepository', () => {
    it('replaces the releases of a tracked repository', async () => {
      const session = buildSession(client);
      await session.addRepository(url('web'));

      client.setPages('octo/web', [[
        releaseDto('web-2', '2024-04-01T00:00:00Z'),
        releaseDto('web-1', '2024-02-01T12:00:00Z'),
      ]]);
      const summary = await session.refreshRepository('octo/web');

      expect(summary).toMatchObject({ releaseCount: 2, color: '#111111', lane: 0 });
    });

    it('keeps the previous releases when the refresh fails', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));

      client.failOn('octo/api', 1, githubError(500, {}, 'Server Error'));

      await expect(session.refreshRepository('octo/api')).rejects.toBeInstanceOf(TransientNetworkError);
      expect(session.listRepositories()[0].releaseCount).toBe(2);
    });
  });

  describe('date range and chart', () => {
    it('shows everything until a range is set', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));
      await session.addRepository(url('web'));

      const stats = session.getStatistics();

      expect(stats).toEqual({
        totalReleases: 3,
        perRepository: { 'octo/api': 2, 'octo/web': 1 },
        earliest: '2024-01-10T12:00:00.000Z',
        latest: '2024-03-10T12:00:00.000Z',
        repositoryCount: 2,
        trackedReleases: 3,
      });
      expect(session.getChartSpec().range).toEqual({
        start: '2024-01-10T12:00:00.000Z',
        end: '2024-03-10T12:00:00.000Z',
      });
    });

    it('treats date-only bounds as whole UTC days', async () => {
      const session = buildSession(client);
      await session.addRepository(url('web'));

      const range = session.setDateRange('2024-02-01', '2024-02-01');

      expect(range).toEqual({ start: '2024-02-01T00:00:00.000Z', end: '2024-02-01T23:59:59.999Z' });
      expect(session.getChartSpec().points.map((p) => p.label)).toEqual(['web-1']);
    });

    it('reflects range changes on the next build', async () => {
      const session = buildSession(client);
      await session.addRepository(url('api'));

      session.setDateRange('2024-03-01T00:00:00Z', '2024-12-31');
      expect(session.getStatistics().totalReleases).toBe(1);

      session.clearDateRange();
      expect(session.getStatistics().totalReleases).toBe(2);
      expect(session.getDateRange()).toBeNull();
    });

    it('rejects an inverted or unparseable range and keeps the current one', () => {
      const session = buildSession(client);
      session.setDateRange('2024-01-01', '2024-06-30');

      expect(() => session.setDateRange('2024-07-01', '2024-06-30')).toThrow(
        new InvalidDateRangeError('Start date must be before end date'),
      );
      expect(() => session.setDateRange('yesterday', '2024-06-30')).toThrow(InvalidDateRangeError);
      expect(session.getDateRange()).toEqual({
        start: '2024-01-01T00:00:00.000Z',
        end: '2024-06-30T23:59:59.999Z',
      });
    });
  });

  describe('date range bounds', () => {
    it('rejects calendar dates that do not exist', () => {
      const session = buildSession(client);

      expect(() => session.setDateRange('2024-02-30', '2024-03-01')).toThrow(
        new InvalidDateRangeError('Invalid start date: "2024-02-30"'),
      );
      expect(() => session.setDateRange('2024-01-01', '2023-02-29T10:00:00Z')).toThrow(
        new InvalidDateRangeError('Invalid end date: "2023-02-29T10:00:00Z"'),
      );
      expect(session.getDateRange()).toBeNull();
    });

    it('accepts a leap day', () => {
      const session = buildSession(client);

      expect(session.setDateRange('2024-02-29', '2024-02-29')).toEqual({
        start: '2024-02-29T00:00:00.000Z',
        end: '2024-02-29T23:59:59.999Z',
      });
    });

    it('reads a timestamp without a zone designator as UTC', () => {
      const session = buildSession(client);

      expect(session.setDateRange('2024-01-01T10:00:00', '2024-01-02T08:30')).toEqual({
        start: '2024-01-01T10:00:00.000Z',
        end: '2024-01-02T08:30:00.000Z',
      });
    });

    it('honours an explicit offset', () => {
      const session = buildSession(client);

      expect(session.setDateRange('2024-01-01T10:00:00+02:00', '2024-01-02')).toEqual({
        start: '2024-01-01T08:00:00.000Z',
        end: '2024-01-02T23:59:59.999Z',
      });
    });
  });

  describe('setToken', () => {
    it('verifies the token and uses it for later fetches', async () => {
      const session = buildSession(client, { githubToken: null });

      await expect(session.setToken(' user-token ')).resolves.toEqual({ login: 'octocat' });
      await session.addRepository(url('api'));

      expect(session.hasToken).toBe(true);
      expect(client.calls[0].token).toBe('user-token');
    });

    it('keeps the previous token when verification fails', async () => {
      const session = buildSession(client, { githubToken: null });
      client.viewer = githubError(401, {}, 'Bad credentials');

      await expect(session.setToken('wrong-token')).rejects.toBeInstanceOf(AuthError);
      expect(session.hasToken).toBe(false);
    });
  });
});
