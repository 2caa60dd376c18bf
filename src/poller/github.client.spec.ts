import { GitHubClient, changeKindOf } from './github.client';
import { UpstreamError } from './upstream-source';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('GitHubClient', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;
  const client = new GitHubClient({ baseUrl: 'https://api.test/', token: 'test-token', timeoutMs: 1000 });

  beforeEach(() => {
    fetchMock = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => jest.restoreAllMocks());

  it('reads repository attributes', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ description: 'Widget factory', language: 'Go', private: true, default_branch: 'trunk' }),
    );

    await expect(client.getRepository('octo', 'widgets')).resolves.toEqual({
      description: 'Widget factory',
      language: 'Go',
      visibility: 'private',
      default_branch: 'trunk',
    });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.test/repos/octo/widgets',
      expect.objectContaining({
        headers: {
          Accept: 'application/vnd.github+json',
          'User-Agent': 'commit-ingest',
          Authorization: 'Bearer test-token',
        },
      }),
    );
  });

  it('lists recent commit hashes newest first', async () => {
    fetchMock.mockResolvedValueOnce(json([{ sha: 'c3' }, { sha: 'c2' }, { sha: 'c1' }]));

    await expect(client.listRecentCommits('octo', 'widgets', 2)).resolves.toEqual(['c3', 'c2']);
    expect(fetchMock.mock.calls[0][0]).toBe('https://api.test/repos/octo/widgets/commits?per_page=2');
  });

  it('treats an unknown or empty repository as having no commits', async () => {
    fetchMock.mockResolvedValueOnce(json({ message: 'Not Found' }, 404));
    await expect(client.listRecentCommits('octo', 'gone', 20)).resolves.toEqual([]);
  });

  it('maps a commit with its changed files', async () => {
    fetchMock.mockResolvedValueOnce(
      json({
        sha: 'abc123',
        html_url: 'https://example.com/octo/widgets/commit/abc123',
        commit: {
          message: 'Add widget sizing',
          author: { name: 'Octo Cat', email: 'octocat@example.com', date: '2024-05-01T10:00:00Z' },
        },
        author: { login: 'octocat' },
        files: [
          { filename: 'src/size.ts', status: 'added' },
          { filename: 'src/old.ts', status: 'removed' },
          { filename: 'src/new.ts', status: 'renamed' },
        ],
      }),
    );

    await expect(client.getCommit('octo', 'widgets', 'abc123')).resolves.toEqual({
      sha: 'abc123',
      author: 'octocat',
      author_email: 'octocat@example.com',
      message: 'Add widget sizing',
      committed_at: '2024-05-01T10:00:00Z',
      url: 'https://example.com/octo/widgets/commit/abc123',
      files: [
        { path: 'src/size.ts', change: 'added' },
        { path: 'src/old.ts', change: 'deleted' },
        { path: 'src/new.ts', change: 'renamed' },
      ],
    });
  });

  it('marks rate limits and server errors as retryable', async () => {
    fetchMock.mockResolvedValueOnce(json({}, 503));
    const failure = client.getRepository('octo', 'widgets');

    await expect(failure).rejects.toBeInstanceOf(UpstreamError);
    await expect(failure).rejects.toMatchObject({
      retryable: true,
      message: 'GET /repos/octo/widgets answered HTTP 503',
    });
  });

  it('marks other client errors as final', async () => {
    fetchMock.mockResolvedValueOnce(json({}, 403));
    await expect(client.getRepository('octo', 'widgets')).rejects.toMatchObject({ retryable: false });
  });

  it('marks network failures as retryable', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(client.getCommit('octo', 'widgets', 'abc123')).rejects.toMatchObject({
      retryable: true,
      message: 'GET /repos/octo/widgets/commits/abc123 failed: fetch failed',
    });
  });

  it('rejects a response it cannot read', async () => {
    fetchMock.mockResolvedValueOnce(json({ sha: 'abc123' }));
    await expect(client.getCommit('octo', 'widgets', 'abc123')).rejects.toMatchObject({
      retryable: false,
      message: expect.stringMatching(/^Unexpected GitHub response for commit abc123/),
    });
  });
});

describe('changeKindOf', () => {
  it('falls back to modified for statuses it does not know', () => {
    expect(changeKindOf('copied')).toBe('modified');
    expect(changeKindOf('removed')).toBe('deleted');
  });
});
