export type RecognizedBody =
  | 'Sun'
  | 'Mercury'
  | 'Venus'
  | 'Earth'
  | 'Mars'
  | 'Jupiter'
  | 'Saturn'
  | 'Uranus'
  | 'Neptune'
  | 'Pluto';

export interface BodyStyle {
  name: RecognizedBody;
  color: string;
}

// Couleurs fixes du graphe polaire ; les autres corps (Lune...) prennent la couleur auto du rendu.
export const BODY_STYLES: BodyStyle[] = [
  { name: 'Sun', color: '#ffcc33' },
  { name: 'Mercury', color: '#b1adad' },
  { name: 'Venus', color: '#e3bb76' },
  { name: 'Earth', color: '#4f83cc' },
  { name: 'Mars', color: '#c1440e' },
  { name: 'Jupiter', color: '#d8ca9d' },
  { name: 'Saturn', color: '#e4d191' },
  { name: 'Uranus', color: '#7de3f4' },
  { name: 'Neptune', color: '#3f54ba' },
  { name: 'Pluto', color: '#9c8b7a' }
];

const COLOR_BY_NAME = new Map<string, string>(BODY_STYLES.map((b) => [b.name, b.color]));

export function bodyColor(name: string): string | undefined {
  return COLOR_BY_NAME.get(name);
}
