import type { MockAgent } from 'undici';
import { CookieValidator } from '../services/cookieValidator';
import { createMockAgent, mockTransport, pathIs } from './testUtils';

const SITE = 'https://www.terabox.com';
const COOKIE = 'ndus=test-cookie';

describe('CookieValidator', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = createMockAgent();
  });

  afterEach(async () => {
    await agent.close();
  });

  function validator(): CookieValidator {
    return new CookieValidator(mockTransport(agent));
  }

  function home(status: number, body = ''): void {
    agent.get(SITE).intercept({ path: '/', method: 'GET', headers: { cookie: COOKIE } }).reply(status, body);
  }

  function userInfo(status: number, body: unknown): void {
    agent.get(SITE)
      .intercept({ path: '/api/user/info', method: 'GET' })
      .reply(status, typeof body === 'string' ? body : JSON.stringify(body));
  }

  it('should reject a malformed cookie without a request', async () => {
    await expect(validator().validate('theme=dark; lang=en')).resolves.toEqual({
      status: 'invalid',
      message: 'Cookie does not contain any recognized TeraBox cookies',
    });
  });

  it('should accept a cookie whose home page looks logged in', async () => {
    home(200, '<a>Logout</a> <a>Profile</a> <nav>My Files</nav>');

    await expect(validator().validate(COOKIE)).resolves.toEqual({
      status: 'valid',
      message: 'Cookie appears to be valid (logged in)',
    });
  });

  it('should warn when the home page offers a login', async () => {
    home(200, '<a>Login</a> or <a>Register</a>');

    await expect(validator().validate(COOKIE)).resolves.toEqual({
      status: 'warning',
      message: 'Cookie may not be fully authenticated',
    });
  });

  it('should fall back to the user-info API', async () => {
    home(403);
    userInfo(200, { errno: 0 });

    await expect(validator().validate(COOKIE)).resolves.toEqual({
      status: 'valid',
      message: 'Cookie validated via API',
    });
  });

  it('should warn on a user-info error code', async () => {
    home(403);
    userInfo(200, { errno: -6 });

    await expect(validator().validate(COOKIE)).resolves.toEqual({
      status: 'warning',
      message: 'API returned an error, cookie may be invalid',
    });
  });

  it('should fail with the last reason when every check rejects the cookie', async () => {
    home(403);
    userInfo(401, {});
    agent.get(SITE)
      .intercept({ path: '/main', method: 'GET' })
      .reply(302, '', { headers: { location: '/login?redirect=main' } });
    agent.get(SITE).intercept({ path: pathIs('/login'), method: 'GET' }).reply(200, 'sign in');

    await expect(validator().validate(COOKIE)).resolves.toEqual({
      status: 'invalid',
      message: 'Cookie validation failed: Cookie is invalid: redirected to login',
    });
  });

  it('should move on when a check cannot reach the site', async () => {
    agent.get(SITE).intercept({ path: '/', method: 'GET' }).replyWithError(new Error('connection reset')).times(4);
    userInfo(200, 'not json');

    await expect(validator().validate(COOKIE)).resolves.toEqual({
      status: 'warning',
      message: 'API response was not JSON, but request succeeded',
    });
  });
});
