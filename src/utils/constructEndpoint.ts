import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Characters allowed in a section or action segment, e.g. `messages` or `send-template`. */
const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Builds the relative endpoint path `{section}/{action}.json`.
 *
 * The section is lower-cased; the action is used as given. Either segment being
 * empty, or containing anything that would change the path (`/`, `?`, `#`,
 * `.`, whitespace), is rejected with a {@link ConstructURLError}.
 */
export function constructEndpoint(section: string, action: string): SafeWrap<ConstructURLError, string> {
  if (!SEGMENT_PATTERN.test(section)) {
    return [new ConstructURLError(`error constructing endpoint, invalid section "${section}"`, section), null];
  }

  if (!SEGMENT_PATTERN.test(action)) {
    return [new ConstructURLError(`error constructing endpoint, invalid action "${action}"`, action), null];
  }

  return [null, `${section.toLowerCase()}/${action}.json`];
}
