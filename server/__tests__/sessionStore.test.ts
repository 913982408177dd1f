import { describe, expect, it } from 'vitest';

import { SessionStore } from '../src/session/sessionStore';

describe('SessionStore', () => {
  it('creates a session and returns it on later requests', () => {
    const store = new SessionStore(60_000);
    const first = store.getOrCreate();
    const again = store.getOrCreate(first.session.id);

    expect(first.created).toBe(true);
    expect(again.created).toBe(false);
    expect(again.session).toBe(first.session);
  });

  it('starts with no location, zero prefill and no positions', () => {
    const { session } = new SessionStore(60_000).getOrCreate();

    expect(session.location).toBeNull();
    expect(session.positions).toBeNull();
    expect(session.prefill.starChart).toEqual({
      latitude: { value: 0, edited: false },
      longitude: { value: 0, edited: false }
    });
  });

  it('keeps sessions isolated', () => {
    const store = new SessionStore(60_000);
    const a = store.getOrCreate().session;
    const b = store.getOrCreate().session;

    a.prefill.moonPhase.latitude = { value: 12, edited: true };

    expect(a.id).not.toBe(b.id);
    expect(b.prefill.moonPhase.latitude).toEqual({ value: 0, edited: false });
    expect(store.size).toBe(2);
  });

  it('forgets idle sessions after the TTL', () => {
    let now = 1_000;
    const store = new SessionStore(60_000, () => now);
    const { session } = store.getOrCreate();

    now += 59_999;
    expect(store.getOrCreate(session.id).created).toBe(false);

    now += 60_000;
    const next = store.getOrCreate(session.id);
    expect(next.created).toBe(true);
    expect(next.session.id).not.toBe(session.id);
    expect(store.size).toBe(1);
    expect(store.get(session.id)).toBeNull();
  });

  it('replaces an unknown id with a fresh session', () => {
    const store = new SessionStore(60_000);
    const { session, created } = store.getOrCreate('not-a-session');

    expect(created).toBe(true);
    expect(session.id).not.toBe('not-a-session');
  });
});
