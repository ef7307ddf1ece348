import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PriceStore } from "../lib/store";

let dir: string;
let dbPath: string;
let clock: Date;

function makeStore(): PriceStore {
  return new PriceStore({ dbPath, location: "Courbevoie", now: () => clock });
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "price-store-"));
  dbPath = join(dir, "prices.json");
  clock = new Date(2025, 2, 10, 8, 0, 0);
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dir, { recursive: true, force: true });
});

describe("PriceStore.load", () => {
  it("starts empty when the file does not exist", () => {
    const store = makeStore();
    expect(store.getHistory()).toEqual([]);
    expect(store.getLatest()).toBeNull();
  });

  it("treats invalid JSON as an empty store", () => {
    writeFileSync(dbPath, "{not json", "utf-8");
    const store = makeStore();
    expect(store.getHistory()).toEqual([]);
    expect(console.error).toHaveBeenCalled();
  });

  it("treats records of the wrong shape as an empty store", () => {
    writeFileSync(dbPath, JSON.stringify([{ date: "2025-03-10T08:00:00", price: "cheap" }]), "utf-8");
    expect(makeStore().getHistory()).toEqual([]);
  });

  it("reads the stored field names and sorts by timestamp", () => {
    writeFileSync(
      dbPath,
      JSON.stringify([
        { date: "2025-03-11T09:00:00", price: 1.899, fuel: "SP98", postal: "92400", station: "StationA", location: "Courbevoie" },
        { date: "2025-03-10T09:00:00", price: 1.879, fuel: "SP98", postal: "92400", station: "StationA", location: "Courbevoie" },
      ]),
      "utf-8"
    );

    const history = makeStore().getHistory();
    expect(history.map((e) => e.timestamp)).toEqual(["2025-03-10T09:00:00", "2025-03-11T09:00:00"]);
    expect(history[0]).toEqual({
      timestamp: "2025-03-10T09:00:00",
      price: 1.879,
      fuelType: "SP98",
      postalCode: "92400",
      stationName: "StationA",
      location: "Courbevoie",
    });
  });
});

describe("PriceStore.addPrice", () => {
  it("creates an entry stamped with the current time to the second", () => {
    const entry = makeStore().addPrice(1.879, "92400", "StationA");
    expect(entry).toEqual({
      timestamp: "2025-03-10T08:00:00",
      price: 1.879,
      fuelType: "SP98",
      postalCode: "92400",
      stationName: "StationA",
      location: "Courbevoie",
    });
  });

  it("replaces the same station's reading from earlier that day", () => {
    const store = makeStore();
    store.addPrice(1.879, "92400", "StationA");
    clock = new Date(2025, 2, 10, 18, 30, 0);
    store.addPrice(1.901, "92400", "StationA");

    const history = store.getHistory();
    expect(history).toHaveLength(1);
    expect(history[0].price).toBe(1.901);
    expect(history[0].timestamp).toBe("2025-03-10T18:30:00");
  });

  it("keeps readings for different stations on the same day", () => {
    const store = makeStore();
    store.addPrice(1.879, "92400", "StationA");
    store.addPrice(1.859, "92400", "StationB");
    expect(store.getHistory().map((e) => e.stationName)).toEqual(["StationA", "StationB"]);
  });

  it("keeps readings for the same station under different postal codes", () => {
    const store = makeStore();
    store.addPrice(1.879, "92400", "StationA");
    store.addPrice(1.889, "92100", "StationA");
    expect(store.getHistory()).toHaveLength(2);
  });

  it("keeps the previous day's reading", () => {
    const store = makeStore();
    store.addPrice(1.879, "92400", "StationA");
    clock = new Date(2025, 2, 11, 8, 0, 0);
    store.addPrice(1.901, "92400", "StationA");
    expect(store.getHistory().map((e) => e.price)).toEqual([1.879, 1.901]);
  });

  it("keeps history sorted even when the clock goes backwards", () => {
    const store = makeStore();
    clock = new Date(2025, 2, 12, 8, 0, 0);
    store.addPrice(1.899, "92400", "StationA");
    clock = new Date(2025, 2, 11, 8, 0, 0);
    store.addPrice(1.889, "92400", "StationB");

    expect(store.getHistory().map((e) => e.timestamp)).toEqual([
      "2025-03-11T08:00:00",
      "2025-03-12T08:00:00",
    ]);
    expect(store.getLatest()?.stationName).toBe("StationA");
  });

  it("records the given fuel type", () => {
    const entry = makeStore().addPrice(1.759, "92400", "StationA", "E10");
    expect(entry.fuelType).toBe("E10");
  });

  it("rewrites the file with the original record layout", () => {
    makeStore().addPrice(1.879, "92400", "StationA");
    expect(JSON.parse(readFileSync(dbPath, "utf-8"))).toEqual([
      {
        date: "2025-03-10T08:00:00",
        price: 1.879,
        fuel: "SP98",
        postal: "92400",
        station: "StationA",
        location: "Courbevoie",
      },
    ]);
  });

  it("keeps the in-memory entry when the write fails", () => {
    mkdirSync(dbPath);
    const store = makeStore();
    store.addPrice(1.879, "92400", "StationA");
    expect(store.getHistory()).toHaveLength(1);
    expect(console.error).toHaveBeenCalled();
  });
});

describe("PriceStore persistence", () => {
  it("reloads what it saved", () => {
    const store = makeStore();
    store.addPrice(1.879, "92400", "StationA");
    store.addPrice(1.859, "92400", "StationB");

    expect(makeStore().getHistory()).toEqual(store.getHistory());
  });

  it("load, save, load yields the same collection", () => {
    writeFileSync(
      dbPath,
      JSON.stringify([
        { date: "2025-03-12T07:00:00", price: 1.92, fuel: "SP98", postal: "92400", station: "StationB", location: "Courbevoie" },
        { date: "2025-03-11T07:00:00", price: 1.9, fuel: "SP98", postal: "92400", station: "StationA", location: "Courbevoie" },
      ]),
      "utf-8"
    );

    const first = makeStore();
    const before = first.getHistory();
    first.save();

    expect(makeStore().getHistory()).toEqual(before);
  });

  it("creates the parent directory on save", () => {
    dbPath = join(dir, "nested", "data", "prices.json");
    makeStore().addPrice(1.879, "92400", "StationA");
    expect(makeStore().getHistory()).toHaveLength(1);
  });
});
