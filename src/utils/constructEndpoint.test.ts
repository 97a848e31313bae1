import { describe, expect, it } from 'vitest';
import { ConstructURLError } from '../error/constructUrlError.js';
import { constructEndpoint } from './constructEndpoint.js';

describe('constructEndpoint', () => {
  it('joins section and action into a .json path', () => {
    expect(constructEndpoint('users', 'ping')).toEqual([null, 'users/ping.json']);
  });

  it('lower-cases the section but keeps the action', () => {
    expect(constructEndpoint('Messages', 'send-template')).toEqual([null, 'messages/send-template.json']);
    expect(constructEndpoint('Whitelists', 'list_Entries')).toEqual([null, 'whitelists/list_Entries.json']);
  });

  it.each(['', 'send/raw', 'send.json', 'send?x=1', 'send#frag', 'send now', '../users'])(
    'rejects action %j',
    (action) => {
      const [err, endpoint] = constructEndpoint('messages', action);

      expect(endpoint).toBeNull();
      expect(err).toBeInstanceOf(ConstructURLError);
      expect(err?.segment).toBe(action);
      expect(err?.message).toBe(`error constructing endpoint, invalid action "${action}"`);
    },
  );

  it('rejects an invalid section before looking at the action', () => {
    const [err] = constructEndpoint('users/../', '');

    expect(err?.segment).toBe('users/../');
    expect(err?.message).toBe('error constructing endpoint, invalid section "users/../"');
  });
});
