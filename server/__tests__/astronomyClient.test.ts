import { AxiosError } from 'axios';
import { describe, expect, it } from 'vitest';

import { HttpFailure, MalformedResponse, TransportFailure } from '../src/errors';
import { fakeAstronomy } from './helpers/clients';

const observer = { coordinate: { latitude: 1.3, longitude: 103.8 }, date: '2024-03-20' };
const expectedAuth = `Basic ${Buffer.from('test-app-id:test-secret').toString('base64')}`;

describe('AstronomyClient.generateStarChart', () => {
  it('posts the chart request with Basic auth and returns the image URL', async () => {
    const { astronomy, calls } = fakeAstronomy(() => ({
      status: 200,
      data: { data: { imageUrl: 'https://img.test/leo.png' } }
    }));

    await expect(astronomy.generateStarChart({ observer, constellation: 'leo' })).resolves.toBe(
      'https://img.test/leo.png'
    );
    expect(calls[0]).toMatchObject({
      method: 'POST',
      url: 'studio/star-chart',
      authorization: expectedAuth,
      body: {
        style: 'inverted',
        observer: { latitude: 1.3, longitude: 103.8, date: '2024-03-20' },
        view: { type: 'constellation', parameters: { constellation: 'leo' } }
      }
    });
  });

  it('signals HttpFailure on a 500', async () => {
    const { astronomy } = fakeAstronomy(() => ({ status: 500, data: { error: 'internal' } }));

    const err = await astronomy.generateStarChart({ observer, constellation: 'leo' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpFailure);
    expect(err).toMatchObject({ statusCode: 500, provider: 'astronomy', operation: 'star_chart' });
  });

  it('signals MalformedResponse when the image URL is missing', async () => {
    const { astronomy } = fakeAstronomy(() => ({ status: 200, data: { data: {} } }));

    await expect(astronomy.generateStarChart({ observer, constellation: 'leo' })).rejects.toBeInstanceOf(
      MalformedResponse
    );
  });

  it('signals TransportFailure on a timeout', async () => {
    const { astronomy } = fakeAstronomy(() => {
      throw new AxiosError('timeout of 120000ms exceeded', 'ECONNABORTED');
    });

    const err = await astronomy.generateStarChart({ observer, constellation: 'leo' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportFailure);
    expect(err).toMatchObject({ code: 'ECONNABORTED' });
  });
});

describe('AstronomyClient.fetchPositions', () => {
  it('sends the table query and returns the raw payload', async () => {
    const payload = { data: { table: { rows: [] } } };
    const { astronomy, calls } = fakeAstronomy(() => ({ status: 200, data: payload }));

    await expect(
      astronomy.fetchPositions({
        observer: { ...observer, elevation: 10, time: '22:00:00' },
        fromDate: '2024-03-20',
        toDate: '2024-03-20'
      })
    ).resolves.toEqual(payload);
    expect(calls[0]).toMatchObject({ method: 'GET', url: 'bodies/positions', authorization: expectedAuth });
    expect(calls[0].params).toEqual({
      latitude: '1.3',
      longitude: '103.8',
      elevation: '10',
      from_date: '2024-03-20',
      to_date: '2024-03-20',
      time: '22:00:00',
      output: 'table'
    });
  });

  it('signals HttpFailure on a 401', async () => {
    const { astronomy } = fakeAstronomy(() => ({ status: 401 }));

    await expect(
      astronomy.fetchPositions({ observer, fromDate: '2024-03-20', toDate: '2024-03-20' })
    ).rejects.toMatchObject({ statusCode: 401 });
  });
});

describe('AstronomyClient.generateMoonPhase', () => {
  const request = {
    format: 'png' as const,
    moonStyle: 'sketch' as const,
    background: { style: 'stars' as const },
    observer,
    orientation: 'north-up' as const
  };

  it('returns the image URL', async () => {
    const { astronomy, calls } = fakeAstronomy(() => ({
      status: 200,
      data: { data: { imageUrl: 'https://img.test/moon.png' } }
    }));

    await expect(astronomy.generateMoonPhase(request)).resolves.toEqual({
      kind: 'image',
      imageUrl: 'https://img.test/moon.png'
    });
    expect(calls[0].url).toBe('studio/moon-phase');
    expect(calls[0].body).toEqual({
      format: 'png',
      style: { moonStyle: 'sketch', backgroundStyle: 'stars' },
      observer: { latitude: 1.3, longitude: 103.8, date: '2024-03-20' },
      view: { type: 'portrait-simple', orientation: 'north-up' }
    });
  });

  it('surfaces the raw payload when no image URL comes back', async () => {
    const payload = { data: { message: 'queued' } };
    const { astronomy } = fakeAstronomy(() => ({ status: 200, data: payload }));

    await expect(astronomy.generateMoonPhase(request)).resolves.toEqual({ kind: 'raw', payload });
  });

  it('signals HttpFailure on a 403', async () => {
    const { astronomy } = fakeAstronomy(() => ({ status: 403 }));

    await expect(astronomy.generateMoonPhase(request)).rejects.toBeInstanceOf(HttpFailure);
  });
});
