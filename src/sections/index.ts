/**
 * Section clients built on a shared {@link RequestExecutor}.
 * @module
 */
import { RequestExecutor, type RequestExecutorProps } from '../core/executor.js';
import { Messages } from './messages.js';
import { Users } from './users.js';

export type {
  Message,
  MessageInfo,
  NameContent,
  Recipient,
  SearchQuery,
  SendOptions,
  SendResult,
} from './messages.js';
export { Messages } from './messages.js';
export { type BoundSection, bindSection, type Section } from './section.js';
export type { UserInfo, UserSender, UserStats } from './users.js';
export { Users } from './users.js';

/** Section clients sharing one executor. */
export interface MandrillClient {
  executor: RequestExecutor;
  users: Users;
  messages: Messages;
}

/**
 * Creates an executor and the bundled section clients on top of it.
 *
 * @example
 * const { messages } = createMandrill({ apiKey: 'test-key' });
 * const [err, results] = await messages.send({ to: [{ email: 'jane@example.com' }], text: 'hi' });
 */
export function createMandrill(props: RequestExecutorProps = {}): MandrillClient {
  const executor = new RequestExecutor(props);

  return {
    executor,
    users: new Users(executor),
    messages: new Messages(executor),
  };
}
