import { Hono } from 'hono';
import { safeWrapAsync } from '../src/utils/wrap.js';

/** Key the stub accepts; anything else gets the API's Invalid_Key error. */
export const STUB_API_KEY = 'test-key';

/** Base URL executors should use to reach the stub through a stubbed `fetch`. */
export const STUB_BASE_URL = 'http://mandrill.test/api/1.0/';

type Recipient = { email: string };

function isRecipientList(value: unknown): value is Recipient[] {
  return Array.isArray(value) && value.every((item) => typeof item?.email === 'string');
}

/**
 * In-process stand-in for the email API. Answers the way the real API does:
 * JSON on success, a JSON error body with status 500 on API failures.
 *
 * Extra routes under `failures/` produce the server failures the real API can
 * produce behind proxies: a text body, an empty body, and a non-5xx status.
 */
export function createMandrillStub() {
  const app = new Hono().basePath('/api/1.0');
  const calls: string[] = [];

  app.post('/failures/:action{.+\\.json}', (c) => {
    calls.push(c.req.path);
    switch (c.req.param('action')) {
      case 'text.json':
        return c.text('upstream exploded', 500);
      case 'empty.json':
        return c.body(null, 502);
      default:
        return c.text('not found', 404);
    }
  });

  app.post('/:section/:action{.+\\.json}', async (c) => {
    calls.push(c.req.path);
    const [errBody, body] = await safeWrapAsync<Error, Record<string, unknown>>(() => c.req.json());
    if (errBody) {
      return c.json({ status: 'error', code: -2, name: 'ValidationError', message: 'You must specify a key value' }, 500);
    }

    if (body.key !== STUB_API_KEY) {
      return c.json({ status: 'error', code: -1, name: 'Invalid_Key', message: 'Invalid API key' }, 500);
    }

    const route = `${c.req.param('section')}/${c.req.param('action')}`;
    switch (route) {
      case 'users/ping.json':
        return c.json('PONG!');
      case 'users/senders.json':
        return c.json([{ address: 'sender@example.com', created_at: '2013-01-01 15:30:27', sent: 42 }]);
      case 'messages/send.json': {
        const message = body.message;
        const to = typeof message === 'object' && message !== null && 'to' in message ? message.to : undefined;
        if (!isRecipientList(to) || to.length === 0) {
          return c.json({ status: 'error', code: -2, name: 'ValidationError', message: 'Validation error: to' }, 500);
        }

        return c.json(to.map((recipient, i) => ({ email: recipient.email, status: 'sent', reject_reason: null, _id: `id-${i}` })));
      }
      default:
        return c.json({ status: 'error', code: -1, name: 'Unknown_Method', message: `Unknown method "${route}"` }, 500);
    }
  });

  return { app, calls };
}
