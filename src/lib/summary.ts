import { ChartRow, PriceEntry, PriceStats, PricesResponse } from "./types";

export function groupByStation(history: PriceEntry[]): Record<string, PriceEntry[]> {
  const groups: Record<string, PriceEntry[]> = {};
  for (const entry of history) {
    (groups[entry.stationName] ??= []).push(entry);
  }
  return groups;
}

export function computeStats(history: PriceEntry[]): PriceStats {
  if (history.length === 0) {
    return { latest: null, min: null, max: null, total: 0, lastUpdated: null };
  }
  const prices = history.map((e) => e.price);
  const latest = history[history.length - 1];
  return {
    latest,
    min: Math.min(...prices),
    max: Math.max(...prices),
    total: history.length,
    lastUpdated: latest.timestamp,
  };
}

/**
 * One row per calendar day, one column per selected station. A station with
 * several readings on a day keeps the last one.
 */
export function buildChartSeries(history: PriceEntry[], stations: string[]): ChartRow[] {
  const selected = new Set(stations);
  const rows = new Map<string, ChartRow>();

  for (const entry of history) {
    if (!selected.has(entry.stationName)) continue;
    const date = entry.timestamp.split("T")[0];
    const row = rows.get(date) ?? { date };
    row[entry.stationName] = entry.price;
    rows.set(date, row);
  }

  return [...rows.values()].sort((a, b) => a.date.localeCompare(b.date));
}

export function filterByStation(history: PriceEntry[], station?: string | null): PriceEntry[] {
  if (!station) return history;
  return history.filter((e) => e.stationName === station);
}

/** Payload of the prices API; every field reflects the same station filter. */
export function buildPricesResponse(
  history: PriceEntry[],
  station?: string | null
): PricesResponse {
  const filtered = filterByStation(history, station);
  const stats = computeStats(filtered);
  return { history: filtered, latest: stats.latest, stats };
}
