import { PriceExtractionStrategy } from "./types";
import { TextScanStrategy } from "./text-scan";
import { CurrencyElementStrategy } from "./currency-element";

export type { PriceExtractionStrategy } from "./types";
export { TextScanStrategy, CurrencyElementStrategy };

/** Default order: whole-page text scan, then euro-sign elements. */
export function getDefaultStrategies(): PriceExtractionStrategy[] {
  return [new TextScanStrategy(), new CurrencyElementStrategy()];
}
