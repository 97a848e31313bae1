import type { RequestExecutor } from '../core/executor.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { type BoundSection, bindSection, type Section } from './section.js';

/** Sending totals for one period of {@link UserInfo.stats}. */
export interface UserStats {
  sent: number;
  hard_bounces: number;
  soft_bounces: number;
  rejects: number;
  complaints: number;
  unsubs: number;
  opens: number;
  unique_opens: number;
  clicks: number;
  unique_clicks: number;
}

/** Account details returned by `users/info`. */
export interface UserInfo {
  username: string;
  created_at: string;
  public_id: string;
  reputation: number;
  hourly_quota: number;
  backlog: number;
  stats: Record<'today' | 'last_7_days' | 'last_30_days' | 'last_60_days' | 'last_90_days' | 'all_time', UserStats>;
}

/** One sender address returned by `users/senders`. */
export interface UserSender extends UserStats {
  address: string;
  created_at: string;
}

/** Calls in the `users` section. */
export class Users implements Section {
  #section: BoundSection;

  constructor(executor: RequestExecutor) {
    this.#section = bindSection(executor, 'Users');
  }

  sectionName(): string {
    return this.#section.sectionName();
  }

  /** Checks the API key; the API answers `"PONG!"`. */
  ping(): SafeWrapAsync<Error, string> {
    return this.#section.request<string>('ping');
  }

  info(): SafeWrapAsync<Error, UserInfo> {
    return this.#section.request<UserInfo>('info');
  }

  senders(): SafeWrapAsync<Error, UserSender[]> {
    return this.#section.request<UserSender[]>('senders');
  }
}
