import { PriceStore } from "./store";
import { StationPriceSource } from "./extraction";
import { FetchSummary, TrackerConfig } from "./types";

/**
 * Fetches every configured station one after another and commits the
 * prices it finds. A failed station is logged and skipped.
 */
export class FetchOrchestrator {
  constructor(
    private trackerConfig: Pick<TrackerConfig, "stations">,
    private store: PriceStore,
    private source: StationPriceSource
  ) {}

  async run(): Promise<FetchSummary> {
    console.log("[fetch] Starting price fetch for all configured stations...");
    const summary: FetchSummary = { attempted: 0, updated: 0, failed: [] };

    for (const [postalCode, stations] of Object.entries(this.trackerConfig.stations)) {
      console.log(`\n[fetch] Fetching prices for postal code ${postalCode}...`);

      for (const station of stations) {
        summary.attempted++;
        let price: number | null = null;
        try {
          price = await this.source.fetchStationPrice({
            postalCode,
            stationName: station.name,
            aliases: station.aliases,
          });
        } catch (err) {
          console.error(
            `[fetch] ${station.name} failed:`,
            err instanceof Error ? err.message : err
          );
        }

        if (price !== null) {
          this.store.addPrice(price, postalCode, station.name, station.fuel);
          summary.updated++;
          console.log(`[fetch] ✓ ${station.name}: €${price}/L`);
        } else {
          summary.failed.push({ postalCode, stationName: station.name });
          console.warn(`[fetch] ✗ Failed to fetch price for ${station.name}`);
        }
      }
    }

    console.log(
      `\n[fetch] Fetch complete. Updated ${summary.updated}/${summary.attempted} station(s)`
    );
    return summary;
  }
}
