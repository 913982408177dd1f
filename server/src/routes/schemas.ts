import { z } from 'zod';

import type { BackgroundStyle } from '../astronomy/requests';
import { CONSTELLATION_IDS } from '../config/constellations';

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);
const isoDate = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/, 'expected YYYY-MM-DD')
  // 2024-02-30 passe la regex mais pas le calendrier.
  .refine((value) => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
  }, 'not a calendar date');
const timeOfDay = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d:[0-5]\d$/, 'expected HH:MM:SS');
const hexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'expected a #rrggbb color');

export const suggestionsQuerySchema = z.object({
  q: z.string().default('')
});

export const locationBodySchema = z.object({
  text: z.string().trim().min(1),
  placeId: z.string().trim().min(1).optional()
});

export const starChartBodySchema = z.object({
  latitude: latitude.optional(),
  longitude: longitude.optional(),
  date: isoDate.optional(),
  constellation: z.enum(CONSTELLATION_IDS)
});

// Champs plats du formulaire -> fond typé (stars | solid + couleur).
export const moonPhaseBodySchema = z
  .object({
    latitude: latitude.optional(),
    longitude: longitude.optional(),
    date: isoDate.optional(),
    format: z.enum(['png', 'svg']).default('png'),
    moonStyle: z.enum(['default', 'sketch', 'shaded']).default('default'),
    backgroundStyle: z.enum(['stars', 'solid']).default('stars'),
    backgroundColor: hexColor.optional(),
    orientation: z.enum(['north-up', 'south-up']).default('north-up')
  })
  .superRefine((body, ctx) => {
    if (body.backgroundStyle === 'solid' && !body.backgroundColor) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['backgroundColor'],
        message: 'backgroundColor is required when backgroundStyle is "solid"'
      });
    }
  })
  .transform(({ backgroundStyle, backgroundColor, ...rest }) => {
    const background: BackgroundStyle =
      backgroundStyle === 'solid' && backgroundColor
        ? { style: 'solid', color: backgroundColor }
        : { style: 'stars' };
    return { ...rest, background };
  });

export const positionsBodySchema = z.object({
  latitude,
  longitude,
  elevation: z.number().finite().optional(),
  date: isoDate.optional(),
  toDate: isoDate.optional(),
  time: timeOfDay.optional()
});

export const positionsViewQuerySchema = z.object({
  center: z.string().trim().min(1).optional(),
  zoom: z.coerce.number().finite().optional()
});
