export type WeatherIcon =
  | 'storm'
  | 'drizzle'
  | 'rain'
  | 'snow'
  | 'haze/mist'
  | 'tornado'
  | 'clear'
  | 'partly-cloudy'
  | 'cloudy'
  | 'unknown';

// Inclusive ranges, checked in order
const ICON_RANGES: ReadonlyArray<readonly [number, number, WeatherIcon]> = [
  [200, 232, 'storm'],
  [300, 321, 'drizzle'],
  [500, 531, 'rain'],
  [600, 622, 'snow'],
  [701, 771, 'haze/mist'],
  [781, 781, 'tornado'],
  [800, 800, 'clear'],
  [801, 801, 'partly-cloudy'],
  [802, 804, 'cloudy'],
];

export function iconFor(conditionCode: number): WeatherIcon {
  const match = ICON_RANGES.find(([from, to]) => conditionCode >= from && conditionCode <= to);
  return match ? match[2] : 'unknown';
}

export const COMPASS_POINTS = [
  'N',
  'NNE',
  'NE',
  'ENE',
  'E',
  'ESE',
  'SE',
  'SSE',
  'S',
  'SSW',
  'SW',
  'WSW',
  'W',
  'WNW',
  'NW',
  'NNW',
] as const;

export type CompassPoint = (typeof COMPASS_POINTS)[number];

/**
 * 16-point compass label for a bearing in degrees. Out-of-range bearings wrap
 * (-20 is NNW, 370 is N); non-finite input yields N.
 */
export function compassDirection(degrees: number): CompassPoint {
  if (!Number.isFinite(degrees)) return 'N';
  const bucket = Math.floor((degrees + 11.25) / 22.5);
  const index = ((bucket % 16) + 16) % 16;
  return COMPASS_POINTS[index] ?? 'N';
}

/** "HH:mm" in the process's local time zone. */
export function formatHourLabel(unixSeconds: number): string {
  const date = new Date(unixSeconds * 1000);
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  return `${hours}:${minutes}`;
}
