/**
 * Session state container
 *
 * Holds the current AuthSnapshot. Every change replaces the snapshot with a new
 * frozen object and notifies subscribers; unchanged updates notify nobody.
 */

import type { AuthSnapshot } from '../types/AuthTypes';
import { INITIAL_CONNECTIVITY } from '../types/ConnectivityTypes';
import { EventChannel, type Listener, type Unsubscribe } from '../events/EventChannel';

export const INITIAL_SNAPSHOT: AuthSnapshot = freezeSnapshot({
  mode: 'Loading',
  session: { bearerToken: null, user: null },
  tier: null,
  connectivity: INITIAL_CONNECTIVITY,
  authError: null,
  connectionMessage: null,
  isRetryingConnection: false,
});

export class SessionStore {
  private snapshot: AuthSnapshot;
  private readonly changes = new EventChannel<AuthSnapshot>('session');

  constructor(initial: AuthSnapshot = INITIAL_SNAPSHOT) {
    this.snapshot = freezeSnapshot(initial);
  }

  getSnapshot(): AuthSnapshot {
    return this.snapshot;
  }

  update(patch: Partial<AuthSnapshot>): AuthSnapshot {
    const next = freezeSnapshot({ ...this.snapshot, ...patch });
    if (sameSnapshot(this.snapshot, next)) {
      return this.snapshot;
    }
    this.snapshot = next;
    this.changes.emit(next);
    return next;
  }

  subscribe(listener: Listener<AuthSnapshot>): Unsubscribe {
    return this.changes.subscribe(listener);
  }
}

function freezeSnapshot(snapshot: AuthSnapshot): AuthSnapshot {
  return Object.freeze({
    ...snapshot,
    session: Object.freeze({ ...snapshot.session }),
    connectivity: Object.freeze({ ...snapshot.connectivity }),
  });
}

function sameSnapshot(a: AuthSnapshot, b: AuthSnapshot): boolean {
  return (
    a.mode === b.mode &&
    a.tier === b.tier &&
    a.authError === b.authError &&
    a.connectionMessage === b.connectionMessage &&
    a.isRetryingConnection === b.isRetryingConnection &&
    a.session.bearerToken === b.session.bearerToken &&
    a.session.user === b.session.user &&
    a.connectivity.connected === b.connectivity.connected &&
    a.connectivity.lastError === b.connectivity.lastError &&
    a.connectivity.message === b.connectivity.message &&
    a.connectivity.checkedAt === b.connectivity.checkedAt
  );
}
