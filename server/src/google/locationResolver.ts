import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';

import type { GoogleConfig } from '../config/appConfig';
import {
  HttpFailure,
  MalformedResponse,
  ProviderStatusFailure,
  TransportFailure,
  transportCode,
  UpstreamError
} from '../errors';
import { errorMessage, logWarn } from '../observability/logger';
import { recordUpstreamCall, UpstreamOutcome } from '../observability/metrics';
import { Coordinate, PlaceSuggestion, ZERO_COORDINATE } from '../types/geo';

const locationSchema = z.object({ lat: z.number(), lng: z.number() });

const autocompleteSchema = z.object({
  status: z.string(),
  predictions: z
    .array(z.object({ description: z.string(), place_id: z.string() }))
    .default([])
});

const detailsSchema = z.object({
  status: z.string(),
  result: z.object({ geometry: z.object({ location: locationSchema }) }).optional()
});

const geocodeSchema = z.object({
  status: z.string(),
  results: z.array(z.object({ geometry: z.object({ location: locationSchema }) })).default([])
});

type GoogleOperation = 'places_autocomplete' | 'place_details' | 'geocode';

function toCoordinate(location: z.infer<typeof locationSchema>): Coordinate {
  return { latitude: location.lat, longitude: location.lng };
}

export function createGoogleHttp(config: GoogleConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    // Le statut HTTP est vérifié à la main, comme le champ `status` du corps.
    validateStatus: () => true
  });
}

/**
 * Transforme une saisie libre en coordonnées via Google Places / Geocoding.
 * `suggest` et `geocodeFallback` ne lèvent jamais d'erreur ; `resolve` si.
 */
export class LocationResolver {
  private readonly http: AxiosInstance;

  constructor(private readonly config: GoogleConfig, http?: AxiosInstance) {
    this.http = http ?? createGoogleHttp(config);
  }

  async suggest(query: string, requestId?: string): Promise<PlaceSuggestion[]> {
    const input = query.trim();
    if (!input) {
      return [];
    }

    try {
      const res = await this.get('places_autocomplete', 'place/autocomplete/json', {
        input,
        types: 'geocode'
      });
      const body = autocompleteSchema.parse(res.data);
      this.checkStatus('places_autocomplete', body.status);
      return body.predictions.map((p) => ({ description: p.description, placeId: p.place_id }));
    } catch (err) {
      logWarn('places_autocomplete_failed', { requestId, error: errorMessage(err) });
      return [];
    }
  }

  async resolve(placeId: string): Promise<Coordinate> {
    const res = await this.get('place_details', 'place/details/json', {
      place_id: placeId,
      fields: 'geometry'
    });
    const parsed = detailsSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new MalformedResponse('google', 'place_details', 'status');
    }
    this.checkStatus('place_details', parsed.data.status);
    if (!parsed.data.result) {
      throw new MalformedResponse('google', 'place_details', 'result.geometry.location');
    }

    return toCoordinate(parsed.data.result.geometry.location);
  }

  async geocodeFallback(text: string, requestId?: string): Promise<Coordinate> {
    try {
      const res = await this.get('geocode', 'geocode/json', { address: text });
      const body = geocodeSchema.parse(res.data);
      this.checkStatus('geocode', body.status);
      const first = body.results[0];
      if (!first) {
        throw new ProviderStatusFailure('google', 'geocode', 'ZERO_RESULTS');
      }
      return toCoordinate(first.geometry.location);
    } catch (err) {
      // Repli volontaire sur (0, 0) pour ne jamais bloquer le formulaire.
      logWarn('geocode_fallback_zero', { requestId, address: text, error: errorMessage(err) });
      return { ...ZERO_COORDINATE };
    }
  }

  private checkStatus(operation: GoogleOperation, status: string): void {
    if (status !== 'OK') {
      throw new ProviderStatusFailure('google', operation, status);
    }
  }

  private async get(
    operation: GoogleOperation,
    path: string,
    params: Record<string, string>
  ): Promise<AxiosResponse<unknown>> {
    const started = Date.now();
    let outcome: UpstreamOutcome = 'ok';
    try {
      const res = await this.http.get<unknown>(path, {
        params: { ...params, key: this.config.apiKey }
      });
      if (res.status !== 200) {
        outcome = 'http_error';
        throw new HttpFailure('google', operation, res.status);
      }
      return res;
    } catch (err) {
      if (err instanceof UpstreamError) {
        throw err;
      }
      outcome = 'transport_error';
      throw new TransportFailure('google', operation, transportCode(err));
    } finally {
      recordUpstreamCall('google', operation, outcome, Date.now() - started);
    }
  }
}
