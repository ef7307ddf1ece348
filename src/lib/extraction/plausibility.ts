export const MIN_PLAUSIBLE_PRICE = 1.5;
export const MAX_PLAUSIBLE_PRICE = 2.5;

/** Open interval: both bounds are rejected. */
export function isPlausiblePrice(price: number): boolean {
  return price > MIN_PLAUSIBLE_PRICE && price < MAX_PLAUSIBLE_PRICE;
}
