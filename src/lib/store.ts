import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import path from "path";
import { format } from "date-fns";
import { z } from "zod";
import { config } from "./config";
import { PriceEntry } from "./types";

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const DAY_FORMAT = "yyyy-MM-dd";

// On-disk record shape; field names match the data files the tracker has
// always written.
const StoredEntrySchema = z.object({
  date: z.string(),
  price: z.number(),
  fuel: z.string(),
  postal: z.string(),
  station: z.string(),
  location: z.string(),
});

type StoredEntry = z.infer<typeof StoredEntrySchema>;

function fromStored(row: StoredEntry): PriceEntry {
  return {
    timestamp: row.date,
    price: row.price,
    fuelType: row.fuel,
    postalCode: row.postal,
    stationName: row.station,
    location: row.location,
  };
}

function toStored(entry: PriceEntry): StoredEntry {
  return {
    date: entry.timestamp,
    price: entry.price,
    fuel: entry.fuelType,
    postal: entry.postalCode,
    station: entry.stationName,
    location: entry.location,
  };
}

function byTimestamp(a: PriceEntry, b: PriceEntry): number {
  if (a.timestamp < b.timestamp) return -1;
  if (a.timestamp > b.timestamp) return 1;
  return 0;
}

export interface PriceStoreOptions {
  dbPath: string;
  location: string;
  now?: () => Date;
}

/**
 * Flat JSON price history. The whole collection is loaded on construction
 * and rewritten wholesale on every addPrice.
 */
export class PriceStore {
  private entries: PriceEntry[];
  private readonly dbPath: string;
  private readonly location: string;
  private readonly now: () => Date;

  constructor(options: PriceStoreOptions) {
    this.dbPath = path.resolve(process.cwd(), options.dbPath);
    this.location = options.location;
    this.now = options.now ?? (() => new Date());
    this.entries = this.load();
  }

  load(): PriceEntry[] {
    if (!existsSync(this.dbPath)) return [];
    try {
      const raw: unknown = JSON.parse(readFileSync(this.dbPath, "utf-8"));
      const rows = z.array(StoredEntrySchema).parse(raw);
      return rows.map(fromStored).sort(byTimestamp);
    } catch (err) {
      console.error(
        `[store] Error loading ${this.dbPath}:`,
        err instanceof Error ? err.message : err
      );
      return [];
    }
  }

  save(): void {
    const tmpPath = `${this.dbPath}.tmp`;
    try {
      const dir = path.dirname(this.dbPath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      writeFileSync(tmpPath, JSON.stringify(this.entries.map(toStored), null, 2), "utf-8");
      renameSync(tmpPath, this.dbPath);
      console.log(`[store] Saved ${this.entries.length} entries`);
    } catch (err) {
      console.error(
        `[store] Error saving ${this.dbPath}:`,
        err instanceof Error ? err.message : err
      );
    }
  }

  addPrice(
    price: number,
    postalCode: string,
    stationName: string,
    fuelType = "SP98"
  ): PriceEntry {
    const now = this.now();
    const today = format(now, DAY_FORMAT);

    // Same-day reading for this station replaces the earlier one
    this.entries = this.entries.filter(
      (e) =>
        !(
          e.timestamp.startsWith(today) &&
          e.stationName === stationName &&
          e.postalCode === postalCode
        )
    );

    const entry: PriceEntry = {
      timestamp: format(now, TIMESTAMP_FORMAT),
      price,
      fuelType,
      postalCode,
      stationName,
      location: this.location,
    };

    this.entries.push(entry);
    this.entries.sort(byTimestamp);
    this.save();
    console.log(`[store] Added €${price}/L for ${stationName} at ${entry.timestamp}`);
    return entry;
  }

  getLatest(): PriceEntry | null {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1] : null;
  }

  getHistory(): PriceEntry[] {
    return [...this.entries];
  }
}

/** Fresh snapshot of the price file, for read-only consumers. */
export function openStore(): PriceStore {
  return new PriceStore({ dbPath: config.dbPath, location: config.location });
}
