import { AstronomyClient, createAstronomyHttp } from '../../src/astronomy/astronomyClient';
import { createGoogleHttp, LocationResolver } from '../../src/google/locationResolver';
import { FakeHandler, installFakeAdapter, RecordedRequest } from './fakeHttp';
import { testConfig } from './fixtures';

export function fakeResolver(handler: FakeHandler): { resolver: LocationResolver; calls: RecordedRequest[] } {
  const http = createGoogleHttp(testConfig.google);
  const calls = installFakeAdapter(http, handler);
  return { resolver: new LocationResolver(testConfig.google, http), calls };
}

export function fakeAstronomy(handler: FakeHandler): { astronomy: AstronomyClient; calls: RecordedRequest[] } {
  const http = createAstronomyHttp(testConfig.astronomy);
  const calls = installFakeAdapter(http, handler);
  return { astronomy: new AstronomyClient(testConfig.astronomy, http), calls };
}

export const SINGAPORE = { lat: 1.2903, lng: 103.8519 };
export const PARIS = { lat: 48.8566, lng: 2.3522 };

/** Places / Geocoding : "p1" = Singapour, "p2" = Paris, le reste = ZERO_RESULTS. */
export const googleHandler: FakeHandler = (req) => {
  if (req.url === 'place/autocomplete/json') {
    return {
      status: 200,
      data: { status: 'OK', predictions: [{ description: 'Singapore', place_id: 'p1' }] }
    };
  }
  if (req.url === 'place/details/json') {
    const location = req.params.place_id === 'p1' ? SINGAPORE : req.params.place_id === 'p2' ? PARIS : null;
    return location
      ? { status: 200, data: { status: 'OK', result: { geometry: { location } } } }
      : { status: 200, data: { status: 'ZERO_RESULTS' } };
  }
  return { status: 200, data: { status: 'ZERO_RESULTS', results: [] } };
};
