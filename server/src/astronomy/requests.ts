import type { ConstellationId } from '../config/constellations';
import type { ObserverContext } from '../types/geo';

export type ImageFormat = 'png' | 'svg';
export type MoonStyle = 'default' | 'sketch' | 'shaded';
export type Orientation = 'north-up' | 'south-up';

export type BackgroundStyle = { style: 'stars' } | { style: 'solid'; color: string };

export interface StarChartRequest {
  observer: ObserverContext;
  constellation: ConstellationId;
}

export interface MoonPhaseRequest {
  format: ImageFormat;
  moonStyle: MoonStyle;
  background: BackgroundStyle;
  observer: ObserverContext;
  orientation: Orientation;
}

export interface PositionsQuery {
  observer: ObserverContext;
  fromDate: string;
  toDate: string;
}

interface ObserverBody {
  latitude: number;
  longitude: number;
  date: string;
}

export interface StarChartBody {
  style: 'inverted';
  observer: ObserverBody;
  view: {
    type: 'constellation';
    parameters: { constellation: ConstellationId };
  };
}

export interface MoonPhaseBody {
  format: ImageFormat;
  style: {
    moonStyle: MoonStyle;
    backgroundStyle: BackgroundStyle['style'];
    backgroundColor?: string;
  };
  observer: ObserverBody;
  view: {
    type: 'portrait-simple';
    orientation: Orientation;
  };
}

export type PositionsParams = {
  latitude: string;
  longitude: string;
  elevation: string;
  from_date: string;
  to_date: string;
  time: string;
  output: 'table';
};

export const DEFAULT_OBSERVATION_TIME = '00:00:00';

function observerBody(observer: ObserverContext): ObserverBody {
  return {
    latitude: observer.coordinate.latitude,
    longitude: observer.coordinate.longitude,
    date: observer.date
  };
}

export function buildStarChartBody(request: StarChartRequest): StarChartBody {
  return {
    style: 'inverted',
    observer: observerBody(request.observer),
    view: {
      type: 'constellation',
      parameters: { constellation: request.constellation }
    }
  };
}

export function buildMoonPhaseBody(request: MoonPhaseRequest): MoonPhaseBody {
  const { background } = request;
  // L'API rejette backgroundColor quand le fond n'est pas "solid".
  const style: MoonPhaseBody['style'] =
    background.style === 'solid'
      ? { moonStyle: request.moonStyle, backgroundStyle: 'solid', backgroundColor: background.color }
      : { moonStyle: request.moonStyle, backgroundStyle: 'stars' };

  return {
    format: request.format,
    style,
    observer: observerBody(request.observer),
    view: {
      type: 'portrait-simple',
      orientation: request.orientation
    }
  };
}

export function buildPositionsParams(query: PositionsQuery): PositionsParams {
  const { observer } = query;
  return {
    latitude: String(observer.coordinate.latitude),
    longitude: String(observer.coordinate.longitude),
    elevation: String(observer.elevation ?? 0),
    from_date: query.fromDate,
    to_date: query.toDate,
    time: observer.time ?? DEFAULT_OBSERVATION_TIME,
    output: 'table'
  };
}
