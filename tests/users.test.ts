import { describe, it, expect } from 'vitest';
import { ConflictError, NotFoundError } from '../src/core/errors.js';
import { makeState, unwrap } from './helpers.js';

describe('UsersRepository', () => {
  it('creates and looks up users', () => {
    const state = makeState();

    const user = unwrap(state.users.createUser({ name: 'Ursula', email: 'ursula@example.com' }));

    expect(state.users.getUser(user.id)).toEqual(user);
    expect(state.users.getUser('missing')).toBeNull();
    expect(() => state.users.requireUser('missing')).toThrow(NotFoundError);
  });

  it('validates name and email', () => {
    const state = makeState();

    const res = state.users.createUser({ name: ' ', email: 'not-an-email' });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toMatchObject({ fields: { name: ["can't be blank"], email: ['has invalid format'] } });
  });

  it('rejects a duplicate email', () => {
    const state = makeState();
    unwrap(state.users.createUser({ name: 'Ursula', email: 'ursula@example.com' }));

    const res = state.users.createUser({ name: 'Other Ursula', email: 'ursula@example.com' });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(ConflictError);
    expect(res.error.message).toBe('User already exists');
  });
});
