import { ConfigError, loadTrackerConfig } from "../lib/config";
import { PriceStore } from "../lib/store";
import { PriceExtractor } from "../lib/extraction";
import { FetchOrchestrator } from "../lib/fetcher";
import { TrackerConfig } from "../lib/types";

async function main() {
  const args = process.argv.slice(2);
  let configPath: string | undefined;

  // Parse --config flag
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--config" && args[i + 1]) {
      configPath = args[i + 1];
      i++;
    }
  }

  let trackerConfig: TrackerConfig;
  try {
    trackerConfig = loadTrackerConfig(configPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[config] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const store = new PriceStore({
    dbPath: trackerConfig.dbPath,
    location: trackerConfig.location,
  });
  const extractor = new PriceExtractor({ targetUrl: trackerConfig.targetUrl });
  const summary = await new FetchOrchestrator(trackerConfig, store, extractor).run();

  console.log(`\n=== Summary ===`);
  console.log(`Updated: ${summary.updated}/${summary.attempted} station(s)`);
  for (const failure of summary.failed) {
    console.log(`Failed: ${failure.stationName} (${failure.postalCode})`);
  }

  process.exit(0);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
