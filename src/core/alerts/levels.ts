import type { AlertLevel } from '../../types/index.js'

// Ordered by increasing severity.
export const ALERT_LEVELS: readonly AlertLevel[] = [
  {
    code: 'LOW',
    title: '1 Slice / Low',
    color: '#97FF9B',
    img: 'https://www.universalhub.com/images/2007/frenchtoastgreen.jpg',
    text: 'No storm predicted. Harvey Leonard sighs and looks dour on the evening news. '
      + 'Go about your daily business but consider buying second refrigerator for basement, diesel generator. '
      + 'Good time to replenish stocks of maple syrup, cinnamon.',
  },
  {
    code: 'GUARDED',
    title: '2 Slices / Guarded',
    color: '#9799FF',
    img: 'https://www.universalhub.com/images/2007/frenchtoastblue.jpg',
    text: 'Light snow predicted. Subtle grin appears on Harvey Leonard\'s face. '
      + 'Check car fuel gauge, memorize quickest route to emergency supermarket should conditions change.',
  },
  {
    code: 'ELEVATED',
    title: '3 Slices / Elevated',
    color: '#FFFF40',
    img: 'https://www.universalhub.com/images/2007/frenchtoastyellow.jpg',
    text: 'Moderate, plowable snow predicted. Harvey Leonard openly smiles during report. '
      + 'Empty your trunk to make room for milk, eggs and bread. '
      + 'Clear space in refrigerator and head to store for an extra gallon of milk, a spare dozen eggs and a new loaf of bread.',
  },
  {
    code: 'HIGH',
    title: '4 Slices / High',
    color: '#FF821D',
    img: 'https://www.universalhub.com/images/2007/frenchtoastorange.jpg',
    text: 'Heavy snow predicted. Harvey Leonard breaks into huge grin, can\'t keep his hands off the weather map. '
      + 'Proceed at speed limit _before snow starts_ to nearest supermarket to pick up two gallons of milk, '
      + 'a couple dozen eggs and two loaves of bread - per person in household.',
  },
  {
    code: 'SEVERE',
    title: '5 Slices / Severe',
    color: '#F85D58',
    img: 'https://www.universalhub.com/images/2007/frenchtoastred.jpg',
    text: 'Nor\'easter predicted. This is it, people, THE BIG ONE. '
      + 'Harvey Leonard makes repeated references to the Blizzard of \'78. '
      + 'RUSH to emergency supermarket NOW for multiple gallons of milk, cartons of eggs and loaves of bread. '
      + 'IGNORE cries of little old lady you\'ve just trampled in mad rush to get last gallon of milk. '
      + 'Place pets in basement for use as emergency food supply if needed.',
  },
]

const levelByCode = new Map<string, AlertLevel>(
  ALERT_LEVELS.map(level => [level.code, level]),
)

export function normalizeStatusCode(raw: string): string {
  return raw.trim().toUpperCase()
}

export function resolveAlertLevel(status: string): AlertLevel | undefined {
  return levelByCode.get(normalizeStatusCode(status))
}
