import type { MockAgent } from 'undici';
import { ShareResolver } from '../services/shareResolver';
import { ExtractionError } from '../types/errors';
import { createMockAgent, mockTransport, pathIs, queryOf, recordingSleep, testConfig } from './testUtils';

const SHARE_URL = 'https://terabox.com/s/1abc';
const RELAY = 'https://terabox.hnn.workers.dev';

function file(path: string, fsId: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    isdir: 0,
    path,
    fs_id: fsId,
    server_filename: path.split('/').pop(),
    size: 2048,
    thumbs: { url3: `https://thumb.example.test/${fsId}.jpg` },
    ...extra,
  };
}

function dir(path: string, fsId: number, isdir: number | string = 1): Record<string, unknown> {
  return { isdir, path, fs_id: fsId, server_filename: path.split('/').pop(), size: 0 };
}

describe('ShareResolver', () => {
  const config = testConfig();
  let agent: MockAgent;
  let sleep: ReturnType<typeof recordingSleep>;

  beforeEach(() => {
    agent = createMockAgent();
    sleep = recordingSleep();
  });

  afterEach(async () => {
    await agent.close();
  });

  function resolver(): ShareResolver {
    return new ShareResolver({
      transport: mockTransport(agent, config),
      relayTransport: mockTransport(agent, config, 'browser'),
      relayUrl: config.relay.url,
      maxRetries: config.transport.maxRetries,
      retryBaseDelayMs: config.transport.retryBaseDelayMs,
      sleep: sleep.sleep,
      random: () => 0,
    });
  }

  function mockRedirect(surl = 'abc'): void {
    agent.get('https://terabox.com')
      .intercept({ path: '/s/1abc', method: 'GET' })
      .reply(302, '', { headers: { location: `https://www.terabox.com/sharing/link?surl=${surl}` } });
    agent.get('https://www.terabox.com')
      .intercept({ path: pathIs('/sharing/link'), method: 'GET' })
      .reply(200, '<html></html>');
  }

  function mockShareInfo(body: Record<string, unknown>, headers: Record<string, string> = {}): void {
    agent.get('https://www.terabox.com')
      .intercept({
        path: p => pathIs('/api/shorturlinfo')(p) && queryOf(p).shorturl === '1abc' && queryOf(p).app_id === '250528',
        method: 'GET',
        headers,
      })
      .reply(200, body);
  }

  function mockRelayInfo(body: Record<string, unknown> | string, times = 1): void {
    agent.get(RELAY)
      .intercept({
        path: p => pathIs('/api/get-info')(p) && queryOf(p).shorturl === 'abc' && queryOf(p).pwd === '',
        method: 'GET',
      })
      .reply(200, body)
      .times(times);
  }

  describe('resolveReference', () => {
    it('should pair the URL with the short code it redirects to', async () => {
      mockRedirect('xyz_9');

      const ref = await resolver().resolveReference(SHARE_URL);

      expect(ref).toEqual({ url: SHARE_URL, shortCode: 'xyz_9' });
      expect(Object.isFrozen(ref)).toBe(true);
    });
  });

  describe('relay strategy', () => {
    it('should resolve a one-file share with the relay signature', async () => {
      mockRedirect();
      mockShareInfo({ errno: 0, shareid: 111, uk: 222, list: [file('/clip.mp4', 333)] });
      mockRelayInfo({ ok: true, sign: 'S', timestamp: 'T' });

      const resolved = await resolver().resolve(SHARE_URL, 'relay');

      expect(resolved.share).toEqual({ shortCode: 'abc', uk: '222', shareId: '111', sign: 'S', timestamp: 'T' });
      expect(resolved.auth).toEqual({ kind: 'relay', uk: '222', shareId: '111', sign: 'S', timestamp: 'T' });
      expect(resolved.warnings).toEqual([]);
      expect(resolved.fileTree).toEqual([{
        isDirectory: false,
        path: '/clip.mp4',
        remoteId: '333',
        name: 'clip.mp4',
        type: 'video',
        sizeBytes: 2048,
        thumbnailUrl: 'https://thumb.example.test/333.jpg',
        children: [],
      }]);
    });

    it('should retry relay refusals and then fail', async () => {
      mockRedirect();
      mockShareInfo({ errno: 0, shareid: 111, uk: 222, list: [file('/clip.mp4', 333)] });
      mockRelayInfo({ ok: false, message: 'rate limited' }, 4);

      const err = await resolver().resolve(SHARE_URL, 'relay').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err).toMatchObject({ message: 'External service failed: rate limited' });
      expect(sleep.delays).toEqual([1500, 2500, 4500]);
    });

    it('should retry undecodable relay replies', async () => {
      mockRedirect();
      mockShareInfo({ errno: 0, shareid: 111, uk: 222, list: [file('/clip.mp4', 333)] });
      mockRelayInfo('<html>not json</html>');
      mockRelayInfo({ ok: true, sign: 'S2', timestamp: 1700000000 });

      const resolved = await resolver().resolve(SHARE_URL, 'relay');

      expect(resolved.share.sign).toBe('S2');
      expect(resolved.share.timestamp).toBe('1700000000');
      expect(sleep.delays).toEqual([1500]);
    });

    it('should report relay connection failures as extraction errors', async () => {
      mockRedirect();
      mockShareInfo({ errno: 0, shareid: 111, uk: 222, list: [file('/clip.mp4', 333)] });
      agent.get(RELAY)
        .intercept({ path: pathIs('/api/get-info'), method: 'GET' })
        .replyWithError(new Error('connection reset'))
        .times(4);

      const err = await resolver().resolve(SHARE_URL, 'relay').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err instanceof Error && err.message.startsWith('External service connection failed: ')).toBe(true);
    });
  });

  describe('scrape strategy', () => {
    function mockAuthPage(): void {
      agent.get('https://www.terabox.app')
        .intercept({ path: '/wap/share/filelist?surl=abc', method: 'GET' })
        .reply(200, '<script>var t = decodeURIComponent("fn%28%22tok\\\\123%22%29");</script>', {
          headers: { 'set-cookie': 'browserid=bid-1; Path=/' },
        });
    }

    it('should collect the session material and walk directories', async () => {
      mockRedirect();
      mockAuthPage();
      mockShareInfo({
        errno: 0,
        shareid: '111',
        uk: '222',
        sign: 'sig',
        timestamp: 1700000000,
        list: [dir('/Movies', 10), dir('/Docs', 11, '1'), file('/top.pdf', 12)],
      });
      agent.get('https://www.terabox.com')
        .intercept({ path: p => pathIs('/share/list')(p) && queryOf(p).dir === '/Movies', method: 'GET' })
        .reply(200, { errno: 0, list: [file('/Movies/a.mp4', 13)] });
      agent.get('https://www.terabox.com')
        .intercept({ path: p => pathIs('/share/list')(p) && queryOf(p).dir === '/Docs', method: 'GET' })
        .reply(200, { errno: -9, list: [] });

      const resolved = await resolver().resolve(SHARE_URL, 'scrape');

      expect(resolved.auth).toEqual({
        kind: 'scrape',
        uk: '222',
        shareId: '111',
        sign: 'sig',
        timestamp: '1700000000',
        jsToken: 'tok123',
        browserId: 'bid-1',
        cookie: 'lang=id;browserid=bid-1',
      });
      expect(resolved.fileTree.map(node => [node.path, node.isDirectory, node.children.length])).toEqual([
        ['/Movies', true, 1],
        ['/Docs', true, 0],
        ['/top.pdf', false, 0],
      ]);
      expect(resolved.fileTree[0].children[0]).toMatchObject({ path: '/Movies/a.mp4', type: 'video', remoteId: '13' });
      expect(resolved.fileTree[1]).toMatchObject({ type: 'other', sizeBytes: 0, thumbnailUrl: '' });
      expect(resolved.warnings).toEqual([{ path: '/Docs', message: 'Directory listing failed (errno -9)' }]);
    });

    it('should fail when the redirect carries no short code', async () => {
      agent.get('https://terabox.com')
        .intercept({ path: '/s/1abc', method: 'GET' })
        .reply(302, '', { headers: { location: 'https://www.terabox.com/main' } });
      agent.get('https://www.terabox.com').intercept({ path: '/main', method: 'GET' }).reply(200, 'home');

      const err = await resolver().resolve(SHARE_URL, 'scrape').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err).toMatchObject({ message: 'Could not extract short URL from redirect' });
    });

    it('should fail when the page has no token', async () => {
      mockRedirect();
      agent.get('https://www.terabox.app')
        .intercept({ path: '/wap/share/filelist?surl=abc', method: 'GET' })
        .reply(200, '<html>nothing here</html>');

      const err = await resolver().resolve(SHARE_URL, 'scrape').catch((e: unknown) => e);

      expect(err).toMatchObject({ message: 'Could not extract JS token from response' });
    });

    it('should surface listing errors with their errno', async () => {
      mockRedirect();
      mockAuthPage();
      mockShareInfo({ errno: 2, errmsg: 'share expired' });

      const err = await resolver().resolve(SHARE_URL, 'scrape').catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err).toMatchObject({ message: 'Share listing failed (errno 2: share expired)' });
    });

    it('should fail on an empty listing', async () => {
      mockRedirect();
      mockAuthPage();
      mockShareInfo({ errno: 0, shareid: 111, uk: 222, list: [] });

      const err = await resolver().resolve(SHARE_URL, 'scrape').catch((e: unknown) => e);

      expect(err).toMatchObject({ message: 'No files found in the response' });
    });
  });

  describe('cookie strategy', () => {
    it('should send the caller cookie and keep direct links', async () => {
      mockRedirect();
      mockShareInfo(
        {
          errno: 0,
          shareid: 111,
          uk: 222,
          list: [file('/clip.mp4', 333, { dlink: 'https://d.example.test/clip' }), file('/b.jpg', 334)],
        },
        { cookie: 'ndus=test-cookie' },
      );

      const resolved = await resolver().resolve(SHARE_URL, 'cookie', { cookie: ' ndus=test-cookie ' });

      expect(resolved.auth).toEqual({
        kind: 'cookie',
        uk: '222',
        shareId: '111',
        directLinks: { '333': 'https://d.example.test/clip' },
      });
      expect(resolved.fileTree[0].directLink).toBe('https://d.example.test/clip');
      expect(resolved.fileTree[1].directLink).toBeUndefined();
    });

    it('should require a cookie', async () => {
      const err = await resolver().resolve(SHARE_URL, 'cookie', {}).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ExtractionError);
      expect(err).toMatchObject({ message: 'Cookie mode requires a session cookie' });
    });
  });
});
