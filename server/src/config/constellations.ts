export const CONSTELLATION_IDS = [
  'and',
  'aqr',
  'ari',
  'cnc',
  'cap',
  'gem',
  'leo',
  'lib',
  'psc',
  'sgr',
  'sco',
  'tau',
  'vir'
] as const;

export type ConstellationId = (typeof CONSTELLATION_IDS)[number];

export interface ConstellationConfig {
  id: ConstellationId;
  displayName: string;
}

export const CONSTELLATIONS: ConstellationConfig[] = [
  { id: 'and', displayName: 'Andromeda' },
  { id: 'aqr', displayName: 'Aquarius' },
  { id: 'ari', displayName: 'Aries' },
  { id: 'cnc', displayName: 'Cancer' },
  { id: 'cap', displayName: 'Capricornus' },
  { id: 'gem', displayName: 'Gemini' },
  { id: 'leo', displayName: 'Leo' },
  { id: 'lib', displayName: 'Libra' },
  { id: 'psc', displayName: 'Pisces' },
  { id: 'sgr', displayName: 'Sagittarius' },
  { id: 'sco', displayName: 'Scorpius' },
  { id: 'tau', displayName: 'Taurus' },
  { id: 'vir', displayName: 'Virgo' }
];

export const CONSTELLATION_BY_ID = new Map<ConstellationId, ConstellationConfig>(
  CONSTELLATIONS.map((c) => [c.id, c])
);
