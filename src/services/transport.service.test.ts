import { describe, it, expect, beforeEach } from 'vitest';
import { APIError, AuthenticationError, ConnectionError, NotFoundError } from '../errors';
import { FakeApi, TEST_API_KEY, TEST_BASE_URL, silentLogger } from '../test-utils/fake-api';
import { Transport, extractErrorMessage } from './transport.service';

describe('extractErrorMessage', () => {
  it('prefers detail over message', () => {
    expect(extractErrorMessage(400, JSON.stringify({ detail: 'Invalid API key', message: 'other' }))).toBe(
      'Invalid API key'
    );
  });

  it('falls back to message when detail is null', () => {
    expect(extractErrorMessage(400, JSON.stringify({ detail: null, message: 'Quota exceeded' }))).toBe(
      'Quota exceeded'
    );
  });

  it('serializes structured details', () => {
    expect(extractErrorMessage(422, JSON.stringify({ detail: [{ loc: ['query'], msg: 'required' }] }))).toBe(
      '[{"loc":["query"],"msg":"required"}]'
    );
  });

  it('uses the raw text for non-JSON bodies', () => {
    expect(extractErrorMessage(502, 'Bad Gateway')).toBe('Bad Gateway');
  });

  it('uses the raw text for JSON without a known field', () => {
    expect(extractErrorMessage(500, '{"error":"boom"}')).toBe('{"error":"boom"}');
  });

  it('falls back to the status code for empty bodies', () => {
    expect(extractErrorMessage(500, '')).toBe('HTTP 500');
  });
});

describe('Transport.request', () => {
  let api: FakeApi;
  let transport: Transport;

  beforeEach(() => {
    api = new FakeApi();
    transport = new Transport({
      apiKey: TEST_API_KEY,
      baseUrl: TEST_BASE_URL,
      timeoutMs: 5_000,
      logger: silentLogger,
      adapter: api.adapter,
    });
  });

  it('sends the API key, content type, client id and a request id', async () => {
    api.on('POST', '/things', { status: 200, body: { ok: true } });

    const result = await transport.request('POST', '/things', { name: 'x' }, { page: 2 });

    expect(result).toEqual({ ok: true });
    const [call] = api.calls;
    expect(call.baseURL).toBe(TEST_BASE_URL);
    expect(call.timeout).toBe(5_000);
    expect(call.params).toEqual({ page: 2 });
    expect(call.json).toEqual({ name: 'x' });
    expect(call.headers.get('X-API-Key')).toBe(TEST_API_KEY);
    expect(call.headers.get('Content-Type')).toBe('application/json');
    expect(call.headers.get('User-Agent')).toBe('docsearch-node/0.1.0');
    expect(String(call.headers.get('X-Request-Id'))).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('uses a fresh request id per call', async () => {
    api.on('GET', '/ping', { status: 200, body: {} });

    await transport.request('GET', '/ping');
    await transport.request('GET', '/ping');

    expect(api.calls[0].headers.get('X-Request-Id')).not.toBe(api.calls[1].headers.get('X-Request-Id'));
  });

  it('returns arrays unchanged', async () => {
    api.on('GET', '/list', { status: 200, body: [1, 2] });
    await expect(transport.request('GET', '/list')).resolves.toEqual([1, 2]);
  });

  it('returns an empty object for 204', async () => {
    api.on('DELETE', '/things/1', { status: 204 });
    await expect(transport.request('DELETE', '/things/1')).resolves.toEqual({});
  });

  it.each([401, 403])('maps %i to AuthenticationError', async (status) => {
    api.on('GET', '/me', { status, body: { detail: 'Access denied' } });

    const error = await transport.request('GET', '/me').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toHaveProperty('message', 'Access denied');
  });

  it('maps 404 to NotFoundError', async () => {
    api.on('GET', '/missing', { status: 404, body: { detail: 'File not found' } });
    await expect(transport.request('GET', '/missing')).rejects.toThrow(NotFoundError);
  });

  it('maps other failures to APIError with status and body', async () => {
    api.on('GET', '/broken', { status: 500, text: '{"detail":"Internal server error"}' });

    const error = await transport.request('GET', '/broken').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(APIError);
    expect(error).not.toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({
      message: 'Internal server error',
      statusCode: 500,
      responseBody: '{"detail":"Internal server error"}',
    });
  });

  it('wraps failures without a response in ConnectionError', async () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:443');
    api.on('GET', '/down', cause);

    const error = await transport.request('GET', '/down').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toBeInstanceOf(APIError);
    expect(error).toHaveProperty('message', 'Request failed: connect ECONNREFUSED 127.0.0.1:443');
    expect(error).toHaveProperty('cause', cause);
  });

  it('rejects a success body that is not JSON', async () => {
    api.on('GET', '/html', { status: 200, text: '<html></html>' });
    await expect(transport.request('GET', '/html')).rejects.toThrow('Invalid JSON in response to GET /html');
  });
});

describe('Transport.putToStorage', () => {
  let api: FakeApi;
  let transport: Transport;
  const url = 'https://storage.test/bucket/key?signature=abc';

  beforeEach(() => {
    api = new FakeApi();
    transport = new Transport({
      apiKey: TEST_API_KEY,
      baseUrl: TEST_BASE_URL,
      timeoutMs: 1_000,
      logger: silentLogger,
      adapter: api.adapter,
    });
  });

  it('puts the bytes with a longer timeout and no API key', async () => {
    api.on('PUT', url, { status: 200 });

    await transport.putToStorage(url, Buffer.from('hello'), { contentType: 'text/plain', contentLength: 5 });

    const [call] = api.calls;
    expect(call.bytes?.toString()).toBe('hello');
    expect(call.timeout).toBe(10_000);
    expect(call.baseURL).toBeUndefined();
    expect(call.headers.get('Content-Type')).toBe('text/plain');
    expect(call.headers.get('X-API-Key')).toBeUndefined();
  });

  it('reports storage rejections with the provider status and body', async () => {
    api.on('PUT', url, { status: 403, text: '<Error><Code>SignatureDoesNotMatch</Code></Error>' });

    const error = await transport
      .putToStorage(url, Buffer.from('x'), { contentType: 'text/plain', contentLength: 1 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(APIError);
    expect(error).toMatchObject({
      message: 'Failed to upload file to storage: <Error><Code>SignatureDoesNotMatch</Code></Error>',
      statusCode: 403,
    });
  });
});
