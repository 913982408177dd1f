export interface Coordinate {
  latitude: number;
  longitude: number;
}

export const ZERO_COORDINATE: Coordinate = Object.freeze({ latitude: 0, longitude: 0 });

export interface PlaceSuggestion {
  description: string;
  placeId: string;
}

export interface ObserverContext {
  coordinate: Coordinate;
  /** YYYY-MM-DD */
  date: string;
  elevation?: number;
  /** HH:MM:SS */
  time?: string;
}
