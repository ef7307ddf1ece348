// Marker the price site puts on the partner stations this tracker follows
const KNOWN_STATION_MARKERS = ["RELAIS"];

/** Full identifier, then the part before the first "|" ("RELAIS X | 92400" -> "RELAIS X"). */
export function stationIdentifiers(stationName: string, aliases: string[] = []): string[] {
  const short = stationName.split("|")[0].trim();
  const ids = [stationName, short, ...aliases, ...KNOWN_STATION_MARKERS];
  return [...new Set(ids.filter((id) => id.length > 0))];
}

export function findStationReference(
  html: string,
  stationName: string,
  aliases: string[] = []
): string | null {
  return stationIdentifiers(stationName, aliases).find((id) => html.includes(id)) ?? null;
}
