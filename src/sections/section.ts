import type { RequestExecutor } from '../core/executor.js';
import type { JsonValue, RequestPayload } from '../types/json.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Anything that can name the API section its calls belong to. */
export interface Section {
  /** Lower-cased section name used as the first path segment, e.g. `messages`. */
  sectionName(): string;
}

/** A {@link RequestExecutor} bound to one section. */
export interface BoundSection extends Section {
  /** Executes `action` within the bound section. */
  request<T = JsonValue>(action: string, payload?: RequestPayload): SafeWrapAsync<Error, T>;
}

/**
 * Binds a shared executor to a section name, lower-cased once so every call
 * uses the same segment. Section clients hold the result rather than
 * extending the executor.
 *
 * @example
 * class Tags {
 *   #section: BoundSection;
 *
 *   constructor(executor: RequestExecutor) {
 *     this.#section = bindSection(executor, 'Tags');
 *   }
 *
 *   list() {
 *     return this.#section.request<TagInfo[]>('list');
 *   }
 * }
 */
export function bindSection(executor: RequestExecutor, name: string): BoundSection {
  const section = name.toLowerCase();

  return {
    sectionName: () => section,
    request: <T = JsonValue>(action: string, payload?: RequestPayload) =>
      executor.execute<T>(section, action, payload),
  };
}
