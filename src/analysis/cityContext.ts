export type CityEntry = {
  keyword: string;
  city: string;
  context: string;
};

// Checked in order: a keyword must come before any shorter keyword it
// contains ("tangerang selatan" before "tangerang").
export const CITY_TABLE: readonly CityEntry[] = [
  {
    keyword: 'jakarta',
    city: 'Jakarta',
    context: 'DKI Jakarta - Pusat bisnis dan pemerintahan',
  },
  {
    keyword: 'tangerang selatan',
    city: 'Tangerang Selatan',
    context: 'Tangerang Selatan - Area berkembang dengan infrastruktur modern',
  },
  {
    keyword: 'tangerang',
    city: 'Tangerang',
    context: 'Tangerang - Kawasan industri dan residential',
  },
  {
    keyword: 'bekasi',
    city: 'Bekasi',
    context: 'Bekasi - Buffer zone Jakarta dengan pertumbuhan pesat',
  },
  {
    keyword: 'bogor',
    city: 'Bogor',
    context: 'Bogor - Area sejuk dengan akses ke Jakarta',
  },
  {
    keyword: 'depok',
    city: 'Depok',
    context: 'Depok - Kota satelit dengan banyak universitas',
  },
];

export const DEFAULT_CITY = 'Jakarta';
export const GENERIC_CONTEXT = 'Area Jabodetabek - Kawasan metropolitan Jakarta';

// Jakarta is the default search city, never a keyword: road names such as
// "Jalan Raya Jakarta-Bogor" would otherwise hide the satellite city.
const NEWS_CITY_TABLE = CITY_TABLE.filter((entry) => entry.keyword !== 'jakarta');

function findEntry(
  table: readonly CityEntry[],
  locationName: string,
): CityEntry | undefined {
  const lower = locationName.toLowerCase();
  return table.find((entry) => lower.includes(entry.keyword));
}

export function resolveCityContext(locationName: string): string {
  return findEntry(CITY_TABLE, locationName)?.context ?? GENERIC_CONTEXT;
}

/** City name used for the news keyword query. */
export function resolveNewsCity(locationName: string): string {
  return findEntry(NEWS_CITY_TABLE, locationName)?.city ?? DEFAULT_CITY;
}
