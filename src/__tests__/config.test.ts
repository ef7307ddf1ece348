import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, config, loadTrackerConfig, parseTrackerConfig } from "../lib/config";

describe("parseTrackerConfig", () => {
  it("fills in port, fuel and aliases defaults", () => {
    const parsed = parseTrackerConfig({ stations: { "92400": [{ name: "RELAIS COURBEVOIE" }] } });

    expect(parsed.server.port).toBe(9000);
    expect(parsed.stations["92400"]).toEqual([
      { name: "RELAIS COURBEVOIE", fuel: "SP98", aliases: [] },
    ]);
    expect(parsed.dbPath).toBe(config.dbPath);
    expect(parsed.targetUrl).toBe(config.targetUrl);
  });

  it("keeps explicit values", () => {
    const parsed = parseTrackerConfig({
      server: { port: 8080 },
      stations: { "92400": [{ name: "ESSO BECON", fuel: "E10", aliases: ["ESSO"] }] },
    });

    expect(parsed.server.port).toBe(8080);
    expect(parsed.stations["92400"][0]).toEqual({ name: "ESSO BECON", fuel: "E10", aliases: ["ESSO"] });
  });

  it("rejects a station without a name", () => {
    expect(() => parseTrackerConfig({ stations: { "92400": [{ fuel: "SP98" }] } })).toThrow(
      ConfigError
    );
  });

  it("names the offending path", () => {
    expect(() => parseTrackerConfig({ server: { port: "nine" } })).toThrow(/server\.port/);
  });
});

describe("loadTrackerConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "tracker-config-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads a JSON config file", () => {
    const file = join(dir, "tracker.config.json");
    writeFileSync(file, JSON.stringify({ server: { port: 9100 }, stations: {} }), "utf-8");

    expect(loadTrackerConfig(file).server.port).toBe(9100);
  });

  it("throws ConfigError for a missing file", () => {
    expect(() => loadTrackerConfig(join(dir, "missing.json"))).toThrow(ConfigError);
  });

  it("throws ConfigError for a YAML config in the older layout", () => {
    const file = join(dir, "config.yaml");
    writeFileSync(file, "server:\n  port: 9000\nstations:\n  \"92400\":\n    - name: RELAIS COURBEVOIE\n", "utf-8");

    expect(() => loadTrackerConfig(file)).toThrow(/Error parsing config/);
  });

  it("throws ConfigError for unparseable JSON", () => {
    const file = join(dir, "broken.json");
    writeFileSync(file, "stations: [", "utf-8");

    expect(() => loadTrackerConfig(file)).toThrow(ConfigError);
  });
});
