import { randomUUID } from 'crypto';

import type { PositionsQuery } from '../astronomy/requests';
import type { CelestialBodyPosition } from '../positions/positionTable';
import type { Coordinate } from '../types/geo';

export type PrefilledWorkflow = 'starChart' | 'moonPhase';

export const PREFILLED_WORKFLOWS: PrefilledWorkflow[] = ['starChart', 'moonPhase'];

export interface PrefillField {
  value: number;
  /** Une fois modifié par l'utilisateur, le champ n'est plus réécrit par la localisation. */
  edited: boolean;
}

export interface CoordinatePrefill {
  latitude: PrefillField;
  longitude: PrefillField;
}

export interface ResolvedLocation {
  coordinate: Coordinate;
  placeId: string | null;
  label: string;
  resolvedAt: string;
}

export interface LoadedPositions {
  rows: CelestialBodyPosition[];
  query: PositionsQuery;
  fetchedAt: string;
}

export interface SessionState {
  id: string;
  location: ResolvedLocation | null;
  prefill: Record<PrefilledWorkflow, CoordinatePrefill>;
  positions: LoadedPositions | null;
  createdAt: number;
  lastActiveAt: number;
}

function emptyPrefill(): CoordinatePrefill {
  return {
    latitude: { value: 0, edited: false },
    longitude: { value: 0, edited: false }
  };
}

export function createSessionState(id: string, now: number): SessionState {
  return {
    id,
    location: null,
    prefill: { starChart: emptyPrefill(), moonPhase: emptyPrefill() },
    positions: null,
    createdAt: now,
    lastActiveAt: now
  };
}

/**
 * Sessions en mémoire, isolées, perdues au redémarrage.
 * Une session inactive depuis `ttlMs` est oubliée au prochain accès.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  get(id: string): SessionState | null {
    const session = this.sessions.get(id);
    if (!session) {
      return null;
    }
    if (this.isExpired(session, this.now())) {
      this.sessions.delete(id);
      return null;
    }
    return session;
  }

  getOrCreate(id?: string): { session: SessionState; created: boolean } {
    const now = this.now();
    this.sweep(now);

    const existing = id ? this.get(id) : null;
    if (existing) {
      existing.lastActiveAt = now;
      return { session: existing, created: false };
    }

    const session = createSessionState(randomUUID(), now);
    this.sessions.set(session.id, session);
    return { session, created: true };
  }

  private isExpired(session: SessionState, now: number): boolean {
    return now - session.lastActiveAt >= this.ttlMs;
  }

  private sweep(now: number): void {
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
      }
    }
  }
}
