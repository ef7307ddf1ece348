export {
  PriceExtractor,
  extractStationPrice,
  DEFAULT_TIMINGS,
} from "./extractor";
export type {
  ExtractionTimings,
  PriceExtractorOptions,
  StationPriceSource,
  StationQuery,
} from "./extractor";
export { isPlausiblePrice, MIN_PLAUSIBLE_PRICE, MAX_PLAUSIBLE_PRICE } from "./plausibility";
export { findStationReference, stationIdentifiers } from "./station-match";
export * from "./strategies";
