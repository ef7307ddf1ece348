/**
 * One way of pulling a price out of rendered page HTML. Strategies are tried
 * in order; the first non-null result wins.
 */
export interface PriceExtractionStrategy {
  name: string;
  extract(html: string): number | null;
}
