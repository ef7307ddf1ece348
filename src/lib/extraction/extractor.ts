import {
  BrowserSession,
  InputHandle,
  SessionFactory,
  launchSession,
  withSession,
} from "../scraping/browser";
import { delay } from "../scraping/utils";
import { findStationReference } from "./station-match";
import { PriceExtractionStrategy, getDefaultStrategies } from "./strategies";

const POSTAL_INPUT_SELECTORS = [
  "input[placeholder*='postal']",
  "input[placeholder*='code']",
  "input[type='text'][id*='postal']",
  "input[type='text'][id*='commune']",
];
const FALLBACK_INPUT_SELECTOR = "input[type='text']";

export interface ExtractionTimings {
  settleMs: number;
  afterTypeMs: number;
  afterSubmitMs: number;
  resultsMs: number;
  afterScrollMs: number;
}

export const DEFAULT_TIMINGS: ExtractionTimings = {
  settleMs: 4000,
  afterTypeMs: 2000,
  afterSubmitMs: 3000,
  resultsMs: 3000,
  afterScrollMs: 2000,
};

export interface StationQuery {
  postalCode: string;
  stationName: string;
  aliases?: string[];
}

/** Anything that can produce a station price; the orchestrator only needs this. */
export interface StationPriceSource {
  fetchStationPrice(query: StationQuery): Promise<number | null>;
}

export interface PriceExtractorOptions {
  targetUrl: string;
  sessionFactory?: SessionFactory;
  strategies?: PriceExtractionStrategy[];
  timings?: Partial<ExtractionTimings>;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Apply the extraction heuristic to already-rendered HTML: the station must be
 * referenced somewhere on the page, then each strategy is tried in order.
 */
export function extractStationPrice(
  html: string,
  query: StationQuery,
  strategies: PriceExtractionStrategy[] = getDefaultStrategies()
): number | null {
  const reference = findStationReference(html, query.stationName, query.aliases);
  if (!reference) {
    console.warn(`[extractor] Station '${query.stationName}' not found in page content`);
    return null;
  }
  console.log(`[extractor] Found station reference "${reference}" for ${query.stationName}`);

  for (const strategy of strategies) {
    const price = strategy.extract(html);
    if (price !== null) {
      console.log(`[extractor] ${strategy.name}: €${price}/L for ${query.stationName}`);
      return price;
    }
  }
  return null;
}

/**
 * Drives one fresh headless browser per station against the price site.
 * Expected failures (timeouts, missing elements, no match) resolve to null.
 */
export class PriceExtractor implements StationPriceSource {
  private readonly targetUrl: string;
  private readonly sessionFactory: SessionFactory;
  private readonly strategies: PriceExtractionStrategy[];
  private readonly timings: ExtractionTimings;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: PriceExtractorOptions) {
    this.targetUrl = options.targetUrl;
    this.sessionFactory = options.sessionFactory ?? launchSession;
    this.strategies = options.strategies ?? getDefaultStrategies();
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings };
    this.sleep = options.sleep ?? delay;
  }

  async fetchStationPrice(query: StationQuery): Promise<number | null> {
    console.log(`[extractor] Fetching price for ${query.stationName} in ${query.postalCode}`);
    try {
      return await withSession(this.sessionFactory, (session) =>
        this.extractFromSession(session, query)
      );
    } catch (err) {
      console.warn(
        `[extractor] Browser error for ${query.stationName}:`,
        err instanceof Error ? err.message : err
      );
      return null;
    }
  }

  private async extractFromSession(
    session: BrowserSession,
    query: StationQuery
  ): Promise<number | null> {
    await session.navigate(this.targetUrl);
    await this.sleep(this.timings.settleMs);

    await this.submitPostalCode(session, query.postalCode);

    console.log("[extractor] Waiting for search results...");
    await this.sleep(this.timings.resultsMs);
    await session.scrollToBottom();
    await this.sleep(this.timings.afterScrollMs);

    const html = await session.content();
    return extractStationPrice(html, query, this.strategies);
  }

  private async submitPostalCode(session: BrowserSession, postalCode: string): Promise<void> {
    try {
      const input = await this.findPostalInput(session);
      if (!input) {
        console.warn("[extractor] No postal code input found, using page as rendered");
        return;
      }
      await input.clear();
      await input.type(postalCode);
      console.log(`[extractor] Entered postal code: ${postalCode}`);
      await this.sleep(this.timings.afterTypeMs);

      await input.pressEnter();
      await this.sleep(this.timings.afterSubmitMs);
    } catch (err) {
      console.warn(
        "[extractor] Could not fill postal code:",
        err instanceof Error ? err.message : err
      );
    }
  }

  private async findPostalInput(session: BrowserSession): Promise<InputHandle | null> {
    for (const selector of POSTAL_INPUT_SELECTORS) {
      try {
        const input = await session.findFirst(selector);
        if (input) return input;
      } catch (err) {
        console.warn(
          `[extractor] Selector ${selector} failed:`,
          err instanceof Error ? err.message : err
        );
      }
    }
    return session.findFirst(FALLBACK_INPUT_SELECTOR);
  }
}
