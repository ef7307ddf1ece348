import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { TrackerConfig } from "./types";

export const config = {
  trackerConfigPath: process.env.TRACKER_CONFIG || "tracker.config.json",
  dbPath: process.env.DB_PATH || "data/prices.json",
  targetUrl: process.env.TARGET_URL || "https://www.prix-carburants.gouv.fr/",
  location: process.env.STATION_LOCATION || "Courbevoie",
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const StationSchema = z.object({
  name: z.string().min(1),
  fuel: z.string().min(1).default("SP98"),
  aliases: z.array(z.string().min(1)).default([]),
});

const TrackerFileSchema = z.object({
  server: z
    .object({ port: z.number().int().positive().default(9000) })
    .default({}),
  stations: z.record(z.string(), z.array(StationSchema)).default({}),
});

export function parseTrackerConfig(raw: unknown): TrackerConfig {
  const parsed = TrackerFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid tracker config: ${issues}`);
  }
  return {
    ...parsed.data,
    dbPath: config.dbPath,
    targetUrl: config.targetUrl,
    location: config.location,
  };
}

/**
 * Read and validate the station config file. Throws ConfigError on any
 * failure; callers at process start treat that as fatal.
 */
export function loadTrackerConfig(
  configPath: string = config.trackerConfigPath
): TrackerConfig {
  const fullPath = path.resolve(process.cwd(), configPath);

  let text: string;
  try {
    text = readFileSync(fullPath, "utf-8");
  } catch (err) {
    throw new ConfigError(
      `Config file not found: ${fullPath} (${err instanceof Error ? err.message : err})`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Error parsing config ${fullPath}: ${err instanceof Error ? err.message : err}`
    );
  }

  const trackerConfig = parseTrackerConfig(raw);
  console.log(`[config] Loaded config from ${fullPath}`);
  return trackerConfig;
}
