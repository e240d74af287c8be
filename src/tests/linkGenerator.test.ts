import type { MockAgent } from 'undici';
import { decodeWrappedPayload } from '../helpers/linkWrapper';
import { LinkGenerator, mirrorLinks } from '../services/linkGenerator';
import { MOBILE_USER_AGENT } from '../transport/userAgents';
import type { RelayAuth, ScrapeAuth } from '../types';
import { DownloadError } from '../types/errors';
import { createMockAgent, mockTransport, pathIs, queryOf, testConfig } from './testUtils';

const RELAY = 'https://terabox.hnn.workers.dev';

const scrapeAuth: ScrapeAuth = {
  kind: 'scrape',
  uk: '222',
  shareId: '111',
  sign: 'sig',
  timestamp: '1700000000',
  jsToken: 'tok123',
  browserId: 'bid-1',
  cookie: 'lang=id;browserid=bid-1',
};

const relayAuth: RelayAuth = { kind: 'relay', uk: '222', shareId: '111', sign: 'S', timestamp: 'T' };

describe('mirrorLinks', () => {
  it('should swap the throttle marker and the edge host', () => {
    expect(mirrorLinks('https://label7.cdn.example.test/f?by=themis&x=1')).toEqual({
      medium: 'https://label7.cdn.example.test/f?by=dapunta&x=1',
      fast: 'https://d3.cdn.example.test/f?by=dapunta&x=1',
    });
  });

  it('should return null for a URL without a dotted host', () => {
    expect(mirrorLinks('not a url')).toBeNull();
  });
});

describe('LinkGenerator', () => {
  const config = testConfig();
  let agent: MockAgent;

  beforeEach(() => {
    agent = createMockAgent();
  });

  afterEach(async () => {
    await agent.close();
  });

  function generator(): LinkGenerator {
    return new LinkGenerator({
      transport: mockTransport(agent, config),
      relayTransport: mockTransport(agent, config, 'browser'),
      relayUrl: RELAY,
      wrapperHosts: ['host-a', 'host-b'],
      random: () => 0,
    });
  }

  function mockShareDownload(body: Record<string, unknown>): void {
    agent.get('https://www.terabox.com')
      .intercept({
        path: p => pathIs('/share/download')(p)
          && queryOf(p).fid_list === '[42]'
          && queryOf(p).jsToken === 'tok123'
          && queryOf(p).sign === 'sig',
        method: 'GET',
        headers: { cookie: 'lang=id;browserid=bid-1' },
      })
      .reply(200, body);
  }

  describe('scrape sessions', () => {
    it('should rank the resolved link and its mirrors', async () => {
      mockShareDownload({ errno: 0, dlink: 'https://d.example.test/file/42?by=themis' });
      agent.get('https://d.example.test')
        .intercept({ path: '/file/42?by=themis', method: 'HEAD' })
        .reply(302, '', { headers: { location: 'https://label7.cdn.example.test/f?by=themis&x=1' } });
      agent.get('https://label7.cdn.example.test')
        .intercept({ path: '/f?by=themis&x=1', method: 'HEAD' })
        .reply(200, '');

      await expect(generator().generate('42', scrapeAuth)).resolves.toEqual({
        slow: 'https://d.example.test/file/42?by=themis',
        medium: 'https://label7.cdn.example.test/f?by=dapunta&x=1',
        fast: 'https://d3.cdn.example.test/f?by=dapunta&x=1',
      });
    });

    it('should keep the slow link when the mirror lookup fails', async () => {
      mockShareDownload({ errno: 0, dlink: 'https://d.example.test/file/42' });
      agent.get('https://d.example.test')
        .intercept({ path: '/file/42', method: 'HEAD' })
        .replyWithError(new Error('connection reset'));

      await expect(generator().generate('42', scrapeAuth)).resolves.toEqual({
        slow: 'https://d.example.test/file/42',
      });
    });

    it('should fail on a refused download request', async () => {
      mockShareDownload({ errno: 112 });

      const err = await generator().generate('42', scrapeAuth).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DownloadError);
      expect(err).toMatchObject({ message: 'Download link request failed (errno 112)' });
    });
  });

  describe('relay sessions', () => {
    it('should return the plain link and a wrapped proxied link', async () => {
      agent.get(RELAY)
        .intercept({ path: '/api/get-download', method: 'POST', body: b => b.includes('"fs_id":"42"') })
        .reply(200, { downloadLink: 'https://dl.example.test/slow' });
      agent.get(RELAY)
        .intercept({ path: '/api/get-downloadp', method: 'POST', headers: { 'user-agent': MOBILE_USER_AGENT } })
        .reply(200, { downloadLink: 'https://dl.example.test/p?id=9' });

      const links = await generator().generate('42', relayAuth);

      expect(links).toEqual({
        slow: 'https://dl.example.test/slow',
        medium: 'https://host-a.workers.dev/?url=aHR0cHMlM0ElMkYlMkZkbC5leGFtcGxlLnRlc3QlMkZwJTNGaWQlM0Q5',
      });
      expect(decodeWrappedPayload(links.medium ?? '')).toBe('https%3A%2F%2Fdl.example.test%2Fp%3Fid%3D9');
    });

    it('should succeed with only one of the two links', async () => {
      agent.get(RELAY)
        .intercept({ path: '/api/get-download', method: 'POST' })
        .reply(200, { error: 'nope' });
      agent.get(RELAY)
        .intercept({ path: '/api/get-downloadp', method: 'POST' })
        .reply(200, { downloadLink: 'https://dl.example.test/p?id=9' });

      const links = await generator().generate('42', relayAuth);

      expect(links.slow).toBeUndefined();
      expect(links.medium).toBe('https://host-a.workers.dev/?url=aHR0cHMlM0ElMkYlMkZkbC5leGFtcGxlLnRlc3QlMkZwJTNGaWQlM0Q5');
    });

    it('should fail when the relay returns neither link', async () => {
      agent.get(RELAY).intercept({ path: '/api/get-download', method: 'POST' }).reply(500, 'down');
      agent.get(RELAY).intercept({ path: '/api/get-downloadp', method: 'POST' }).reply(200, 'not json');

      const err = await generator().generate('42', relayAuth).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DownloadError);
      expect(err).toMatchObject({ message: 'External service returned no download links' });
    });
  });

  describe('official sessions', () => {
    it('should ask the Open Platform for the file link', async () => {
      agent.get('https://api.example.test')
        .intercept({
          path: p => pathIs('/openapi/share/download')(p)
            && queryOf(p).access_token === 'test-token'
            && queryOf(p).fid_list === '[42]'
            && queryOf(p).sekey === 'sk',
          method: 'GET',
        })
        .reply(200, { errno: 0, list: [{ fs_id: 42, dlink: 'https://d.example.test/official' }] });

      const links = await generator().generate('42', {
        kind: 'official',
        accessToken: 'test-token',
        apiDomain: 'api.example.test',
        uk: '222',
        shareId: '111',
        sekey: 'sk',
      });

      expect(links).toEqual({ slow: 'https://d.example.test/official' });
    });
  });

  describe('recorded links', () => {
    it('should serve cookie-session links without a request', async () => {
      const links = await generator().generate('7', {
        kind: 'cookie',
        uk: '1',
        shareId: '2',
        directLinks: { '7': 'https://d.example.test/7' },
      });
      expect(links).toEqual({ slow: 'https://d.example.test/7' });
    });

    it('should fail for a file the cookie session did not list', async () => {
      const err = await generator()
        .generate('8', { kind: 'cookie', uk: '1', shareId: '2', directLinks: {} })
        .catch((e: unknown) => e);
      expect(err).toMatchObject({ message: 'No direct link recorded for this file' });
    });

    it('should add the commercial download link only when it differs', async () => {
      const auth = {
        kind: 'commercial' as const,
        links: {
          a: { direct: 'https://d.example.test/a', download: 'https://dl.example.test/a' },
          b: { direct: 'https://d.example.test/b', download: 'https://d.example.test/b' },
        },
      };

      await expect(generator().generate('a', auth)).resolves.toEqual({
        slow: 'https://d.example.test/a',
        medium: 'https://dl.example.test/a',
      });
      await expect(generator().generate('b', auth)).resolves.toEqual({ slow: 'https://d.example.test/b' });
    });
  });
});
