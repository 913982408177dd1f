import { bodyColor } from '../config/bodies';
import type { PositionTable } from './positionTable';

export const REFERENCE_RINGS_AU = [1, 5, 10, 20, 30] as const;

const RING_STEP_DEG = 5;
const MIN_ZOOM = 1;

export interface MarkerTrace {
  type: 'scatterpolar';
  mode: 'markers';
  name: string;
  r: number[];
  theta: number[];
  text: string[];
  marker: { size: number; color?: string };
  showlegend: true;
}

export interface RingTrace {
  type: 'scatterpolar';
  mode: 'lines';
  name: string;
  r: number[];
  theta: number[];
  line: { dash: 'dot'; width: number; color: string };
  hoverinfo: 'skip';
  showlegend: false;
}

export interface PolarLayout {
  title: string;
  showlegend: true;
  polar: {
    radialaxis: { range: [number, number]; title: string };
    angularaxis: { rotation: 90; direction: 'clockwise' };
  };
}

/** Figure au format Plotly (data + layout), rendue telle quelle par le front. */
export type PolarPlot =
  | { kind: 'figure'; data: Array<MarkerTrace | RingTrace>; layout: PolarLayout }
  | { kind: 'empty'; message: string };

export interface ZoomBounds {
  min: number;
  max: number;
}

export function zoomBounds(table: PositionTable): ZoomBounds {
  const farthest = table.rows.reduce((acc, row) => Math.max(acc, row.relativeDistanceAu), 0);
  return { min: MIN_ZOOM, max: Math.max(MIN_ZOOM, farthest) };
}

export function clampZoom(zoom: number | undefined, table: PositionTable): number {
  const bounds = zoomBounds(table);
  if (zoom === undefined || !Number.isFinite(zoom)) {
    return bounds.max;
  }
  return Math.min(bounds.max, Math.max(bounds.min, zoom));
}

function ringTrace(radiusAu: number): RingTrace {
  const theta: number[] = [];
  for (let deg = 0; deg <= 360; deg += RING_STEP_DEG) {
    theta.push(deg);
  }
  return {
    type: 'scatterpolar',
    mode: 'lines',
    name: `${radiusAu} AU`,
    r: theta.map(() => radiusAu),
    theta,
    line: { dash: 'dot', width: 1, color: '#888888' },
    hoverinfo: 'skip',
    showlegend: false
  };
}

function markerTrace(row: PositionTable['rows'][number]): MarkerTrace {
  const color = bodyColor(row.name);
  return {
    type: 'scatterpolar',
    mode: 'markers',
    name: row.name,
    r: [row.relativeDistanceAu],
    theta: [row.azimuthDeg],
    text: [`${row.name}: ${row.relativeDistanceAu.toFixed(3)} AU, az ${row.azimuthDeg.toFixed(1)}°`],
    marker: color ? { size: 12, color } : { size: 12 },
    showlegend: true
  };
}

/**
 * Un point par corps : r = distance relative au centre (AU), θ = azimut.
 * Angle compté dans le sens horaire depuis le haut, comme une boussole.
 * Les points au-delà du zoom restent dans les données et la légende.
 */
export function buildPolarPlot(table: PositionTable | null, options: { zoom?: number } = {}): PolarPlot {
  if (!table || table.rows.length === 0) {
    return {
      kind: 'empty',
      message: 'No planetary positions loaded yet. Fetch positions to draw the chart.'
    };
  }

  const zoom = clampZoom(options.zoom, table);

  return {
    kind: 'figure',
    data: [...REFERENCE_RINGS_AU.map(ringTrace), ...table.rows.map(markerTrace)],
    layout: {
      title: `Distances relative to ${table.center}`,
      showlegend: true,
      polar: {
        radialaxis: { range: [0, zoom], title: 'AU' },
        angularaxis: { rotation: 90, direction: 'clockwise' }
      }
    }
  };
}
