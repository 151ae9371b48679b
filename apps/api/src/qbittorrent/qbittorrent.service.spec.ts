import { BadGatewayException } from '@nestjs/common';
import { QbittorrentService, parseSidCookie } from './qbittorrent.service';
import type { QbittorrentConnection } from './qbittorrent.types';

type MockResponseInput = {
  status: number;
  text?: string;
  json?: unknown;
  setCookie?: string;
};

function mockResponse(input: MockResponseInput): Response {
  const { status } = input;
  const textBody = input.json !== undefined ? JSON.stringify(input.json) : (input.text ?? '');

  return {
    ok: status >= 200 && status < 300,
    status,
    text: jest.fn().mockResolvedValue(textBody),
    headers: {
      get: (name: string) =>
        name.toLowerCase() === 'set-cookie' ? (input.setCookie ?? null) : null,
    },
  } as unknown as Response;
}

const connection: QbittorrentConnection = {
  baseUrl: 'http://qbit.test:8080',
  username: 'admin',
  password: 'test-secret',
  timeoutMs: 1000,
};

describe('QbittorrentService', () => {
  const fetchMock = jest.fn();
  let service: QbittorrentService;

  beforeEach(() => {
    fetchMock.mockReset();
    (global as { fetch: typeof fetch }).fetch = fetchMock as never;
    service = new QbittorrentService();
  });

  it('logs in with form credentials and keeps the SID cookie', async () => {
    fetchMock.mockResolvedValueOnce(
      mockResponse({ status: 200, text: 'Ok.', setCookie: 'SID=abc123; HttpOnly; path=/' }),
    );

    const session = await service.login(connection);

    expect(session).toEqual({
      baseUrl: 'http://qbit.test:8080',
      cookie: 'SID=abc123',
      timeoutMs: 1000,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://qbit.test:8080/api/v2/auth/login');
    const init = fetchMock.mock.calls[0]?.[1] as RequestInit;
    expect(init.method).toBe('POST');
    expect(init.body).toBe('username=admin&password=test-secret');
    expect(init.headers).toMatchObject({
      'Content-Type': 'application/x-www-form-urlencoded',
      Referer: 'http://qbit.test:8080',
    });
  });

  it('rejects a login the client refuses', async () => {
    fetchMock.mockResolvedValueOnce(mockResponse({ status: 200, text: 'Fails.' }));

    const login = service.login(connection);
    await expect(login).rejects.toBeInstanceOf(BadGatewayException);
    await expect(login).rejects.toThrow('qBittorrent login failed: Fails.');
  });

  it('wraps network errors', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(service.login(connection)).rejects.toThrow(
      'qBittorrent login failed: fetch failed',
    );
  });

  it('builds torrent records with their files', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'Ok.', setCookie: 'SID=s1' }))
      .mockResolvedValueOnce(
        mockResponse({
          status: 200,
          json: [
            { hash: 'h1', name: 'Movie', category: 'Films', save_path: '/downloads/films' },
            { hash: 'h2', name: 'Loose', category: '', save_path: '' },
            { name: 'no hash' },
          ],
        }),
      )
      .mockResolvedValueOnce(
        mockResponse({
          status: 200,
          json: [{ index: 0, name: 'Movie/Movie.mkv', size: 5000, progress: 1 }],
        }),
      )
      .mockResolvedValueOnce(mockResponse({ status: 200, json: [{ name: 'x.mkv' }] }));

    const records = await service.fetchTorrentRecords(connection);

    expect(records).toEqual([
      {
        hash: 'h1',
        name: 'Movie',
        category: { kind: 'named', name: 'Films' },
        savePath: '/downloads/films',
        files: [{ name: 'Movie/Movie.mkv', size: 5000 }],
      },
      {
        hash: 'h2',
        name: 'Loose',
        category: { kind: 'uncategorized' },
        savePath: null,
        files: [{ name: 'x.mkv', size: 0 }],
      },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(fetchMock.mock.calls[1]?.[0]).toBe('http://qbit.test:8080/api/v2/torrents/info');
    expect(fetchMock.mock.calls[2]?.[0]).toBe(
      'http://qbit.test:8080/api/v2/torrents/files?hash=h1',
    );
    expect(fetchMock.mock.calls[2]?.[1]).toMatchObject({
      method: 'GET',
      headers: expect.objectContaining({ Cookie: 'SID=s1' }),
    });
  });

  it('surfaces HTTP errors from the Web API', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'Ok.', setCookie: 'SID=s1' }))
      .mockResolvedValueOnce(mockResponse({ status: 403, text: 'Forbidden' }));

    await expect(service.fetchTorrentRecords(connection)).rejects.toThrow(
      'qBittorrent list torrents failed: HTTP 403 Forbidden',
    );
  });

  it('marks a torrent removed while its files are listed and keeps going', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'Ok.', setCookie: 'SID=s1' }))
      .mockResolvedValueOnce(
        mockResponse({
          status: 200,
          json: [
            { hash: 'gone', name: 'Gone', category: 'Films', save_path: '/downloads/films' },
            { hash: 'h1', name: 'Movie', category: 'Films', save_path: '/downloads/films' },
          ],
        }),
      )
      .mockResolvedValueOnce(mockResponse({ status: 404, text: 'Not Found' }))
      .mockResolvedValueOnce(mockResponse({ status: 200, json: [{ name: 'Movie.mkv', size: 5 }] }));

    const records = await service.fetchTorrentRecords(connection);

    expect(records.map((r) => [r.hash, r.files])).toEqual([
      ['gone', null],
      ['h1', [{ name: 'Movie.mkv', size: 5 }]],
    ]);
  });

  it('still fails the run on other file-list errors', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'Ok.', setCookie: 'SID=s1' }))
      .mockResolvedValueOnce(
        mockResponse({ status: 200, json: [{ hash: 'h1', name: 'Movie', save_path: '/d' }] }),
      )
      .mockResolvedValueOnce(mockResponse({ status: 500, text: 'boom' }));

    await expect(service.fetchTorrentRecords(connection)).rejects.toThrow(
      'qBittorrent list torrent files failed: HTTP 500 boom',
    );
  });

  it('rejects a body that is not JSON', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'Ok.' }))
      .mockResolvedValueOnce(mockResponse({ status: 200, text: '<html>' }));

    await expect(service.fetchTorrentRecords(connection)).rejects.toThrow(
      /qBittorrent list torrents failed: invalid JSON/,
    );
  });

  it('omits the cookie header when auth is bypassed', async () => {
    fetchMock
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'Ok.' }))
      .mockResolvedValueOnce(mockResponse({ status: 200, text: 'v4.6.2' }));

    const result = await service.testConnection({
      ...connection,
      baseUrl: 'http://qbit.test:8080/',
    });

    expect(result).toEqual({ ok: true, version: 'v4.6.2' });
    expect(fetchMock.mock.calls[1]?.[0]).toBe('http://qbit.test:8080/api/v2/app/version');
    const headers = (fetchMock.mock.calls[1]?.[1] as RequestInit).headers;
    expect(headers).not.toHaveProperty('Cookie');
  });
});

describe('parseSidCookie', () => {
  it.each([
    ['SID=abc; HttpOnly; path=/', 'SID=abc'],
    ['other=1, SID=xyz; path=/', 'SID=xyz'],
    ['QSID=nope', ''],
    [null, ''],
  ])('parses %s', (header, expected) => {
    expect(parseSidCookie(header)).toBe(expected);
  });
});
