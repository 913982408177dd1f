import type { AppConfig } from '../../src/config/appConfig';
import { basicAuthorization } from '../../src/config/appConfig';

export const testConfig: AppConfig = {
  astronomy: {
    baseUrl: 'https://astronomy.test/api/v2',
    authorization: basicAuthorization('test-app-id', 'test-secret'),
    timeoutMs: 120_000
  },
  google: {
    baseUrl: 'https://maps.test/maps/api',
    apiKey: 'test-google-key',
    timeoutMs: 0
  },
  sessionTtlMs: 60_000,
  port: 0
};

export interface BodyFixture {
  name: string;
  au: number | string | null;
  km?: number | string | null;
  altitude?: number | string;
  azimuth: number | string;
}

// Le fournisseur envoie des chaînes ; null est gardé tel quel pour les cas invalides.
function wire(value: number | string | null): string | null {
  return value === null ? null : String(value);
}

export function positionsPayload(bodies: BodyFixture[], date = '2024-03-20T00:00:00.000+00:00') {
  return {
    data: {
      dates: { from: date, to: date },
      table: {
        header: [date],
        rows: bodies.map((b) => ({
          entry: { id: b.name.toLowerCase(), name: b.name },
          cells: [
            {
              date,
              id: b.name.toLowerCase(),
              name: b.name,
              distance: {
                fromEarth: { au: wire(b.au), km: b.km === undefined ? '0' : wire(b.km) }
              },
              position: {
                horizontal: {
                  altitude: { degrees: String(b.altitude ?? 0), string: '' },
                  azimuth: { degrees: String(b.azimuth), string: '' }
                },
                constellation: { id: 'psc', short: 'Psc', name: 'Pisces' }
              }
            }
          ]
        }))
      }
    }
  };
}
