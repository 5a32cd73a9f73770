export const STATIONS = [
  { id: 'TUS', name: 'TUS Station' },
  { id: 'CT', name: 'CT Station' }
] as const;

export type Station = (typeof STATIONS)[number];
export type StationId = Station['id'];

export const STATION_IDS: readonly StationId[] = STATIONS.map((station) => station.id);

export function isStationId(value: string): value is StationId {
  return STATIONS.some((station) => station.id === value);
}

export function stationName(id: StationId): string {
  return STATIONS.find((station) => station.id === id)?.name ?? id;
}
