import { describe, expect, it } from 'vitest';

import {
  BackgroundStyle,
  buildMoonPhaseBody,
  buildPositionsParams,
  buildStarChartBody,
  ImageFormat,
  MoonStyle
} from '../src/astronomy/requests';

const observer = { coordinate: { latitude: 1.29, longitude: 103.85 }, date: '2024-03-20' };

describe('buildStarChartBody', () => {
  it('builds an inverted constellation view', () => {
    expect(buildStarChartBody({ observer, constellation: 'leo' })).toEqual({
      style: 'inverted',
      observer: { latitude: 1.29, longitude: 103.85, date: '2024-03-20' },
      view: { type: 'constellation', parameters: { constellation: 'leo' } }
    });
  });
});

describe('buildMoonPhaseBody', () => {
  it('sends backgroundColor only with a solid background', () => {
    const formats: ImageFormat[] = ['png', 'svg'];
    const moonStyles: MoonStyle[] = ['default', 'sketch', 'shaded'];
    const backgrounds: BackgroundStyle[] = [{ style: 'stars' }, { style: 'solid', color: '#102030' }];

    for (const format of formats) {
      for (const moonStyle of moonStyles) {
        for (const background of backgrounds) {
          const body = buildMoonPhaseBody({ format, moonStyle, background, observer, orientation: 'north-up' });
          expect('backgroundColor' in body.style).toBe(background.style === 'solid');
          expect(body.style.backgroundStyle).toBe(background.style);
        }
      }
    }
  });

  it('serializes the full request', () => {
    const body = buildMoonPhaseBody({
      format: 'svg',
      moonStyle: 'shaded',
      background: { style: 'solid', color: '#000000' },
      observer,
      orientation: 'south-up'
    });

    expect(JSON.parse(JSON.stringify(body))).toEqual({
      format: 'svg',
      style: { moonStyle: 'shaded', backgroundStyle: 'solid', backgroundColor: '#000000' },
      observer: { latitude: 1.29, longitude: 103.85, date: '2024-03-20' },
      view: { type: 'portrait-simple', orientation: 'south-up' }
    });
  });
});

describe('buildPositionsParams', () => {
  it('defaults elevation and time', () => {
    expect(buildPositionsParams({ observer, fromDate: '2024-03-20', toDate: '2024-03-20' })).toEqual({
      latitude: '1.29',
      longitude: '103.85',
      elevation: '0',
      from_date: '2024-03-20',
      to_date: '2024-03-20',
      time: '00:00:00',
      output: 'table'
    });
  });

  it('passes elevation and time through', () => {
    const params = buildPositionsParams({
      observer: { ...observer, elevation: 15.5, time: '21:30:00' },
      fromDate: '2024-03-20',
      toDate: '2024-03-21'
    });
    expect(params.elevation).toBe('15.5');
    expect(params.time).toBe('21:30:00');
    expect(params.to_date).toBe('2024-03-21');
  });
});
