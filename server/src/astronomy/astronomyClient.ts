import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';

import type { AstronomyConfig } from '../config/appConfig';
import { HttpFailure, MalformedResponse, TransportFailure, transportCode, UpstreamError } from '../errors';
import { logInfo } from '../observability/logger';
import { recordUpstreamCall, UpstreamOutcome } from '../observability/metrics';
import {
  buildMoonPhaseBody,
  buildPositionsParams,
  buildStarChartBody,
  MoonPhaseRequest,
  PositionsQuery,
  StarChartRequest
} from './requests';

type AstronomyOperation = 'star_chart' | 'body_positions' | 'moon_phase';

export type MoonPhaseResult =
  | { kind: 'image'; imageUrl: string }
  | { kind: 'raw'; payload: unknown };

export function createAstronomyHttp(config: AstronomyConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    headers: {
      Authorization: config.authorization,
      'Content-Type': 'application/json'
    },
    validateStatus: () => true
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function extractImageUrl(payload: unknown): string | null {
  const data = isRecord(payload) ? payload.data : undefined;
  const imageUrl = isRecord(data) ? data.imageUrl : undefined;
  return typeof imageUrl === 'string' && imageUrl.length > 0 ? imageUrl : null;
}

/**
 * Client AstronomyAPI (star chart, positions, moon phase).
 * L'en-tête Basic vient de la config figée au démarrage.
 */
export class AstronomyClient {
  private readonly http: AxiosInstance;

  constructor(config: AstronomyConfig, http?: AxiosInstance) {
    this.http = http ?? createAstronomyHttp(config);
  }

  async generateStarChart(request: StarChartRequest, requestId?: string): Promise<string> {
    const res = await this.send('star_chart', {
      method: 'POST',
      url: 'studio/star-chart',
      data: buildStarChartBody(request)
    });
    const imageUrl = extractImageUrl(res.data);
    if (!imageUrl) {
      throw new MalformedResponse('astronomy', 'star_chart', 'data.imageUrl');
    }
    logInfo('star_chart_generated', { requestId, constellation: request.constellation });
    return imageUrl;
  }

  async fetchPositions(query: PositionsQuery): Promise<unknown> {
    const res = await this.send('body_positions', {
      method: 'GET',
      url: 'bodies/positions',
      params: buildPositionsParams(query)
    });
    return res.data;
  }

  async generateMoonPhase(request: MoonPhaseRequest, requestId?: string): Promise<MoonPhaseResult> {
    const res = await this.send('moon_phase', {
      method: 'POST',
      url: 'studio/moon-phase',
      data: buildMoonPhaseBody(request)
    });
    const imageUrl = extractImageUrl(res.data);
    if (!imageUrl) {
      logInfo('moon_phase_raw_payload', { requestId });
      return { kind: 'raw', payload: res.data };
    }
    return { kind: 'image', imageUrl };
  }

  private async send(
    operation: AstronomyOperation,
    request: AxiosRequestConfig
  ): Promise<AxiosResponse<unknown>> {
    const started = Date.now();
    let outcome: UpstreamOutcome = 'ok';
    try {
      const res = await this.http.request<unknown>(request);
      if (res.status < 200 || res.status >= 300) {
        outcome = 'http_error';
        throw new HttpFailure('astronomy', operation, res.status);
      }
      return res;
    } catch (err) {
      if (err instanceof UpstreamError) {
        throw err;
      }
      outcome = 'transport_error';
      throw new TransportFailure('astronomy', operation, transportCode(err));
    } finally {
      recordUpstreamCall('astronomy', operation, outcome, Date.now() - started);
    }
  }
}
