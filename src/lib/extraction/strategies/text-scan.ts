import { PriceExtractionStrategy } from "./types";
import { isPlausiblePrice } from "../plausibility";

const PRICE_PATTERN = /1\.[0-9]{2,3}/g;

/**
 * Collects every distinct 1.xx / 1.xxx number in the page and takes the
 * highest plausible one. Pages list several grades and the premium grade
 * tends to carry the highest price.
 */
export class TextScanStrategy implements PriceExtractionStrategy {
  name = "text-scan";

  extract(html: string): number | null {
    const matches = html.match(PRICE_PATTERN);
    if (!matches) return null;

    const prices = [...new Set(matches)].map((m) => parseFloat(m)).sort((a, b) => a - b);

    for (let i = prices.length - 1; i >= 0; i--) {
      if (isPlausiblePrice(prices[i])) return prices[i];
    }
    return null;
  }
}
