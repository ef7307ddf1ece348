import * as cheerio from "cheerio";
import { PriceExtractionStrategy } from "./types";
import { isPlausiblePrice } from "../plausibility";
import { parsePrice } from "../../scraping/utils";

const CURRENCY = "€";
const MAX_ELEMENTS = 10;
const TEXT_NODE = 3;

/**
 * Looks at the first elements (document order) whose first own text node
 * carries a euro sign and reads the token right before it, e.g. "1.895 €/L".
 */
export class CurrencyElementStrategy implements PriceExtractionStrategy {
  name = "currency-element";

  extract(html: string): number | null {
    const $ = cheerio.load(html);
    const elements = $("body *")
      .filter((_, el) =>
        $(el)
          .contents()
          .filter((_, child) => child.nodeType === TEXT_NODE)
          .first()
          .text()
          .includes(CURRENCY)
      )
      .slice(0, MAX_ELEMENTS);

    for (const el of elements.toArray()) {
      const text = $(el).text().trim();
      if (!text.includes(CURRENCY)) continue;

      const tokens = text.split(CURRENCY)[0].trim().split(/\s+/);
      const price = parsePrice(tokens[tokens.length - 1]);
      if (price !== null && isPlausiblePrice(price)) return price;
    }
    return null;
  }
}
