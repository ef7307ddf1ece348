// ===== Price history =====

export interface PriceEntry {
  timestamp: string; // local time, "yyyy-MM-dd'T'HH:mm:ss"
  price: number; // currency per liter
  fuelType: string;
  postalCode: string;
  stationName: string;
  location: string; // display label, not scraped
}

// ===== Station configuration =====

export interface StationConfig {
  name: string;
  fuel: string;
  aliases: string[];
}

export interface TrackerConfig {
  server: { port: number };
  stations: Record<string, StationConfig[]>; // postal code -> stations
  dbPath: string;
  targetUrl: string;
  location: string;
}

// ===== Fetch run =====

export interface StationRef {
  postalCode: string;
  stationName: string;
}

export interface FetchSummary {
  attempted: number;
  updated: number;
  failed: StationRef[];
}

// ===== Dashboard =====

export interface PriceStats {
  latest: PriceEntry | null;
  min: number | null;
  max: number | null;
  total: number;
  lastUpdated: string | null;
}

export interface PricesResponse {
  history: PriceEntry[];
  latest: PriceEntry | null;
  stats: PriceStats;
}

export interface ChartRow {
  date: string;
  [station: string]: number | string;
}
