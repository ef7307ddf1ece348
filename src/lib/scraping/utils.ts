export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a scraped price token such as "1.895". Only a dot separates the
 * decimals; "1,895" yields null.
 */
export function parsePrice(raw: string): number | null {
  if (!raw) return null;
  const cleaned = raw.trim();
  if (!/^[+-]?(?:\d+\.?\d*|\.\d+)$/.test(cleaned)) return null;
  const num = parseFloat(cleaned);
  return isNaN(num) ? null : num;
}
