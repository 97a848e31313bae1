import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import {
  ApiError,
  classifyError,
  createMandrill,
  HTTPError,
  isServerError,
  type MandrillClient,
  RequestExecutor,
} from '../src/index.js';
import { createMandrillStub, STUB_API_KEY, STUB_BASE_URL } from './server.js';

describe('against the in-process API stub', () => {
  let stub: ReturnType<typeof createMandrillStub>;
  let client: MandrillClient;

  beforeEach(() => {
    stub = createMandrillStub();
    vi.stubGlobal('fetch', async (input: RequestInfo | URL, init?: RequestInit) => stub.app.request(input, init));
    client = createMandrill({ apiKey: STUB_API_KEY, baseUrl: STUB_BASE_URL });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('ping round-trips', async () => {
    const [err, pong] = await client.users.ping();

    expect(err).toBeNull();
    expect(pong).toBe('PONG!');
    expect(stub.calls).toEqual(['/api/1.0/users/ping.json']);
  });

  test('send returns one result per recipient', async () => {
    const [err, results] = await client.messages.send({
      to: [{ email: 'jane@example.com' }, { email: 'john@example.com', type: 'cc' }],
      text: 'Hello',
    });

    expect(err).toBeNull();
    expect(results).toEqual([
      { email: 'jane@example.com', status: 'sent', reject_reason: null, _id: 'id-0' },
      { email: 'john@example.com', status: 'sent', reject_reason: null, _id: 'id-1' },
    ]);
  });

  test('an invalid key comes back as a structured ApiError', async () => {
    client.executor.configure('wrong-key');

    const [err] = await client.users.senders();
    const classified = classifyError(err);

    expect(classified.kind).toBe('structured');
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({ message: 'Invalid API key', code: -1, status: 'error', name: 'Invalid_Key' });
    expect(isServerError(err?.cause)).toBe(true);
  });

  test('an API validation failure keeps its ValidationError name', async () => {
    const [err] = await client.messages.send({ to: [], text: 'Hello' });

    expect(err).toBeInstanceOf(ApiError);
    expect(err?.name).toBe('ValidationError');
  });

  test('unknown methods are reported by the API', async () => {
    const [err] = await client.executor.execute('users', 'unknown');

    expect(err).toMatchObject({ name: 'Unknown_Method', message: 'Unknown method "users/unknown.json"' });
  });

  test('a text error body becomes an unstructured ApiError', async () => {
    const [err] = await client.executor.execute('failures', 'text');

    expect(err).toMatchObject({
      message: 'error in POST http://mandrill.test/api/1.0/failures/text.json in fetchClient, status 500',
      code: 500,
      status: 'ServerError',
      name: 'ServerException',
      kind: 'unstructured',
    });
  });

  test('an empty 502 becomes an unstructured ApiError', async () => {
    const [err] = await client.executor.execute('failures', 'empty');

    expect(classifyError(err).kind).toBe('unstructured');
    expect(err).toMatchObject({ code: 502 });
  });

  test('a 404 is passed through as the transport reported it', async () => {
    const [err] = await client.executor.execute('failures', 'missing');

    expect(err).toBeInstanceOf(HTTPError);
    expect(classifyError(err).kind).toBe('transport');
  });

  test('pointing the base url elsewhere redirects the requests', async () => {
    const executor = new RequestExecutor({ apiKey: STUB_API_KEY });
    executor.setBaseUrl('http://mandrill.test/other/');

    const [err] = await executor.execute('users', 'ping');

    expect(err).toBeInstanceOf(HTTPError);
    expect(err).toMatchObject({ code: 404 });
    expect(stub.calls).toEqual([]);
  });
});
