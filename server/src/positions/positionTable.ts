import { z } from 'zod';

import { InvariantError, MalformedResponse } from '../errors';

// Les valeurs numériques arrivent souvent sous forme de chaînes ("1.0123").
// null et "" ne valent pas 0.
const numeric = z
  .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .refine(Number.isFinite, 'expected a finite number');

const cellSchema = z.object({
  date: z.string(),
  distance: z.object({
    fromEarth: z.object({ au: numeric, km: numeric })
  }),
  position: z.object({
    horizontal: z.object({
      altitude: z.object({ degrees: numeric }),
      azimuth: z.object({ degrees: numeric })
    }),
    constellation: z.object({ name: z.string() }).partial().optional()
  })
});

const rowSchema = z.object({
  entry: z.object({ id: z.string().optional(), name: z.string() }),
  cells: z.array(cellSchema).min(1)
});

const positionsPayloadSchema = z.object({
  data: z.object({
    table: z.object({ rows: z.array(rowSchema) })
  })
});

export interface CelestialBodyPosition {
  name: string;
  bodyId?: string;
  date: string;
  distanceAu: number;
  distanceKm: number;
  altitudeDeg: number;
  azimuthDeg: number;
  constellation?: string;
}

export interface PositionTableRow extends CelestialBodyPosition {
  relativeDistanceAu: number;
}

export interface PositionTable {
  center: string;
  rows: PositionTableRow[];
}

/**
 * Aplatit la réponse `bodies/positions` (format table) en une ligne par corps.
 * Seule la première cellule est lue : une requête = un instantané date/heure.
 */
export function parsePositionRows(payload: unknown): CelestialBodyPosition[] {
  const parsed = positionsPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedResponse('astronomy', 'body_positions', issue ? issue.path.join('.') : 'data.table.rows');
  }

  return parsed.data.data.table.rows.map((row) => {
    const [cell] = row.cells;
    return {
      name: row.entry.name,
      bodyId: row.entry.id,
      date: cell.date,
      distanceAu: cell.distance.fromEarth.au,
      distanceKm: cell.distance.fromEarth.km,
      altitudeDeg: cell.position.horizontal.altitude.degrees,
      azimuthDeg: cell.position.horizontal.azimuth.degrees,
      constellation: cell.position.constellation?.name
    };
  });
}

export function defaultCenter(rows: CelestialBodyPosition[]): string | null {
  if (rows.some((r) => r.name === 'Earth')) {
    return 'Earth';
  }
  return rows[0]?.name ?? null;
}

export function buildPositionTable(rows: CelestialBodyPosition[], center: string): PositionTable {
  const centerRow = rows.find((r) => r.name === center);
  if (!centerRow) {
    throw new InvariantError(`center body "${center}" is not in the position table`);
  }

  return {
    center,
    rows: rows.map((row) => ({
      ...row,
      // Le centre vaut exactement 0, pas un résidu de soustraction.
      relativeDistanceAu: row.name === center ? 0 : Math.abs(row.distanceAu - centerRow.distanceAu)
    }))
  };
}
