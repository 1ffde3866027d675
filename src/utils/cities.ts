/**
 * Cities a subscriber may pick as their preferred city.
 *
 * Taiwan's counties and special municipalities, spelled the way the
 * Central Weather Administration open-data API names them.
 */
export const SUPPORTED_CITIES = [
  '臺北市', '新北市', '桃園市', '臺中市', '臺南市', '高雄市',
  '基隆市', '新竹市', '嘉義市',
  '新竹縣', '苗栗縣', '彰化縣', '南投縣', '雲林縣', '嘉義縣',
  '屏東縣', '宜蘭縣', '花蓮縣', '臺東縣', '澎湖縣', '金門縣', '連江縣',
] as const;

export type SupportedCity = (typeof SUPPORTED_CITIES)[number];

const CITY_SET: ReadonlySet<string> = new Set(SUPPORTED_CITIES);

export function isSupportedCity(city: string): city is SupportedCity {
  return CITY_SET.has(city);
}

/** Accept the common 台/臺 variant users type */
export function normalizeCity(input: string): string {
  return input.trim().replace(/^台/, '臺');
}
