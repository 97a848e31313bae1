import type { RequestExecutor } from '../core/executor.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type BoundSection, bindSection, type Section } from './section.js';

/** A recipient of a {@link Message}. */
export interface Recipient {
  email: string;
  name?: string;
  type?: 'to' | 'cc' | 'bcc';
}

/** Template region content, or a merge variable. */
export interface NameContent {
  name: string;
  content: string;
}

/** Outgoing message. Only the commonly used fields are typed. */
export interface Message {
  to: Recipient[];
  subject?: string;
  html?: string;
  text?: string;
  from_email?: string;
  from_name?: string;
  headers?: Record<string, string>;
  important?: boolean;
  track_opens?: boolean;
  track_clicks?: boolean;
  tags?: string[];
  metadata?: Record<string, string>;
  global_merge_vars?: NameContent[];
}

/** Delivery options shared by `send` and `send-template`. */
export interface SendOptions {
  async?: boolean;
  ip_pool?: string;
  /** UTC timestamp, `YYYY-MM-DD HH:MM:SS`. */
  send_at?: string;
}

/** Per-recipient result of a send. */
export interface SendResult {
  email: string;
  status: 'sent' | 'queued' | 'scheduled' | 'rejected' | 'invalid';
  reject_reason?: string | null;
  _id: string;
}

/** Filters for `messages/search`. All optional. */
export interface SearchQuery {
  query?: string;
  date_from?: string;
  date_to?: string;
  tags?: string[];
  senders?: string[];
  api_keys?: string[];
  limit?: number;
}

/** A sent message as returned by `messages/search` and `messages/info`. */
export interface MessageInfo {
  ts: number;
  _id: string;
  sender: string;
  template: string | null;
  subject: string;
  email: string;
  tags: string[];
  opens: number;
  clicks: number;
  state: 'sent' | 'bounced' | 'rejected';
  metadata?: Record<string, string>;
}

/** Calls in the `messages` section. */
export class Messages implements Section {
  #section: BoundSection;

  constructor(executor: RequestExecutor) {
    this.#section = bindSection(executor, 'Messages');
  }

  sectionName(): string {
    return this.#section.sectionName();
  }

  /** Sends a message; one result per recipient. */
  send(message: Message, opts: SendOptions = {}): SafeWrapAsync<Error, SendResult[]> {
    return this.#section.request<SendResult[]>('send', { ...opts, message });
  }

  /** Sends a message rendered from a stored template. */
  sendTemplate(
    templateName: string,
    templateContent: NameContent[],
    message: Message,
    opts: SendOptions = {},
  ): SafeWrapAsync<Error, SendResult[]> {
    return this.#section.request<SendResult[]>('send-template', {
      ...opts,
      template_name: templateName,
      template_content: templateContent,
      message,
    });
  }

  search(query: SearchQuery = {}): SafeWrapAsync<Error, MessageInfo[]> {
    return this.#section.request<MessageInfo[]>('search', { ...query });
  }

  info(id: string): SafeWrapAsync<Error, MessageInfo> {
    return this.#section.request<MessageInfo>('info', { id });
  }
}
