import type { AstronomyClient, MoonPhaseResult } from '../astronomy/astronomyClient';
import type {
  BackgroundStyle,
  ImageFormat,
  MoonStyle,
  Orientation,
  PositionsQuery
} from '../astronomy/requests';
import { CONSTELLATION_BY_ID, ConstellationId } from '../config/constellations';
import { RequestValidationError } from '../errors';
import type { LocationResolver } from '../google/locationResolver';
import { logInfo } from '../observability/logger';
import { buildPolarPlot, clampZoom, PolarPlot, zoomBounds, ZoomBounds } from '../positions/polarPlot';
import { buildPositionTable, defaultCenter, parsePositionRows, PositionTable } from '../positions/positionTable';
import type { Coordinate, PlaceSuggestion } from '../types/geo';
import { isoDate } from '../types/time';
import {
  CoordinatePrefill,
  PREFILLED_WORKFLOWS,
  PrefilledWorkflow,
  ResolvedLocation,
  SessionState
} from './sessionStore';

export interface LocationInput {
  text: string;
  placeId?: string;
}

interface CoordinateInput {
  latitude?: number;
  longitude?: number;
}

export interface StarChartInput extends CoordinateInput {
  date?: string;
  constellation: ConstellationId;
}

export interface MoonPhaseInput extends CoordinateInput {
  date?: string;
  format: ImageFormat;
  moonStyle: MoonStyle;
  background: BackgroundStyle;
  orientation: Orientation;
}

export interface PositionsInput {
  latitude: number;
  longitude: number;
  elevation?: number;
  date?: string;
  toDate?: string;
  time?: string;
}

export interface FormDefaults {
  latitude: number;
  longitude: number;
  date: string;
}

export interface StarChartResult {
  imageUrl: string;
  caption: string;
  observer: Coordinate & { date: string };
}

export interface PositionsView {
  table: PositionTable | null;
  centers: string[];
  zoom: (ZoomBounds & { value: number }) | null;
  plot: PolarPlot;
}

export interface SessionControllerDeps {
  resolver: LocationResolver;
  astronomy: AstronomyClient;
}

/**
 * Enchaîne les trois parcours (positions, carte du ciel, phase de lune)
 * sur l'état explicite d'une session.
 */
export class SessionController {
  constructor(private readonly deps: SessionControllerDeps) {}

  suggestLocations(query: string, requestId?: string): Promise<PlaceSuggestion[]> {
    return this.deps.resolver.suggest(query, requestId);
  }

  async submitLocation(
    session: SessionState,
    input: LocationInput,
    requestId?: string
  ): Promise<ResolvedLocation> {
    // Avec un place id : details (erreurs remontées). Sinon : geocode, repli (0, 0).
    const coordinate = input.placeId
      ? await this.deps.resolver.resolve(input.placeId)
      : await this.deps.resolver.geocodeFallback(input.text, requestId);

    const location: ResolvedLocation = {
      coordinate,
      placeId: input.placeId ?? null,
      label: input.text,
      resolvedAt: new Date().toISOString()
    };
    session.location = location;

    for (const workflow of PREFILLED_WORKFLOWS) {
      applyLocation(session.prefill[workflow], coordinate);
    }

    logInfo('location_resolved', {
      requestId,
      sessionId: session.id,
      viaPlaceId: Boolean(input.placeId)
    });
    return location;
  }

  formDefaults(session: SessionState, workflow: PrefilledWorkflow): FormDefaults {
    const prefill = session.prefill[workflow];
    return {
      latitude: prefill.latitude.value,
      longitude: prefill.longitude.value,
      date: isoDate()
    };
  }

  async generateStarChart(
    session: SessionState,
    input: StarChartInput,
    requestId?: string
  ): Promise<StarChartResult> {
    const coordinate = takeCoordinate(session.prefill.starChart, input);
    const date = input.date ?? isoDate();
    const imageUrl = await this.deps.astronomy.generateStarChart(
      { observer: { coordinate, date }, constellation: input.constellation },
      requestId
    );
    const constellation = CONSTELLATION_BY_ID.get(input.constellation);
    return {
      imageUrl,
      caption: `Constellation: ${constellation?.displayName ?? input.constellation}`,
      observer: { ...coordinate, date }
    };
  }

  generateMoonPhase(
    session: SessionState,
    input: MoonPhaseInput,
    requestId?: string
  ): Promise<MoonPhaseResult> {
    const coordinate = takeCoordinate(session.prefill.moonPhase, input);
    return this.deps.astronomy.generateMoonPhase(
      {
        format: input.format,
        moonStyle: input.moonStyle,
        background: input.background,
        orientation: input.orientation,
        observer: { coordinate, date: input.date ?? isoDate() }
      },
      requestId
    );
  }

  /**
   * Remplace en bloc les positions de la session si (et seulement si)
   * l'appel et la transformation réussissent.
   */
  async fetchPositions(
    session: SessionState,
    input: PositionsInput,
    requestId?: string
  ): Promise<PositionsView> {
    const fromDate = input.date ?? isoDate();
    const query: PositionsQuery = {
      observer: {
        coordinate: { latitude: input.latitude, longitude: input.longitude },
        date: fromDate,
        elevation: input.elevation,
        time: input.time
      },
      fromDate,
      toDate: input.toDate ?? fromDate
    };

    const payload = await this.deps.astronomy.fetchPositions(query);
    const rows = parsePositionRows(payload);

    session.positions = { rows, query, fetchedAt: new Date().toISOString() };
    logInfo('positions_loaded', { requestId, sessionId: session.id, bodies: rows.length });

    return this.positionsView(session, {});
  }

  positionsView(session: SessionState, options: { center?: string; zoom?: number }): PositionsView {
    const rows = session.positions?.rows ?? [];
    const centers = rows.map((r) => r.name);
    const center = options.center ?? defaultCenter(rows);

    if (rows.length === 0 || !center) {
      return { table: null, centers, zoom: null, plot: buildPolarPlot(null) };
    }
    if (!centers.includes(center)) {
      throw new RequestValidationError(`Unknown center body "${center}". Expected one of: ${centers.join(', ')}`);
    }

    const table = buildPositionTable(rows, center);
    const value = clampZoom(options.zoom, table);
    return {
      table,
      centers,
      zoom: { ...zoomBounds(table), value },
      plot: buildPolarPlot(table, { zoom: value })
    };
  }
}

function applyLocation(prefill: CoordinatePrefill, coordinate: Coordinate): void {
  if (!prefill.latitude.edited) {
    prefill.latitude.value = coordinate.latitude;
  }
  if (!prefill.longitude.edited) {
    prefill.longitude.value = coordinate.longitude;
  }
}

function takeCoordinate(prefill: CoordinatePrefill, input: CoordinateInput): Coordinate {
  if (input.latitude !== undefined && input.latitude !== prefill.latitude.value) {
    prefill.latitude = { value: input.latitude, edited: true };
  }
  if (input.longitude !== undefined && input.longitude !== prefill.longitude.value) {
    prefill.longitude = { value: input.longitude, edited: true };
  }
  return { latitude: prefill.latitude.value, longitude: prefill.longitude.value };
}
