import { openStore } from "@/lib/store";
import { computeStats } from "@/lib/summary";
import { PriceDashboard } from "@/components/PriceDashboard";
import { RefreshButton } from "@/components/RefreshButton";

export const dynamic = "force-dynamic";

function formatPrice(price: number | null): string {
  return price === null ? "—" : `€${price.toFixed(3)}`;
}

export default function Home() {
  const history = openStore().getHistory();
  const stats = computeStats(history);

  return (
    <main className="max-w-6xl mx-auto p-6 space-y-6">
      <header className="flex items-start justify-between">
        <div>
          <h1 className="text-2xl font-bold">Fuel Price Tracker</h1>
          <p className="text-sm text-gray-400">Daily prices per station</p>
        </div>
        <RefreshButton />
      </header>

      {history.length === 0 ? (
        <div className="p-6 bg-gray-900 rounded-lg border border-gray-800 text-gray-400">
          No price data yet. Run: <code>npm run fetch</code>
        </div>
      ) : (
        <>
          <section className="grid grid-cols-1 sm:grid-cols-3 lg:grid-cols-5 gap-4">
            <Stat label="Latest" value={formatPrice(stats.latest?.price ?? null)} hint={stats.latest?.stationName} />
            <Stat label="Lowest" value={formatPrice(stats.min)} />
            <Stat label="Highest" value={formatPrice(stats.max)} />
            <Stat label="Total Records" value={String(stats.total)} />
            <Stat label="Last Updated" value={stats.lastUpdated?.split("T")[0] ?? "—"} hint={stats.lastUpdated?.split("T")[1]} />
          </section>
          <PriceDashboard history={history} />
        </>
      )}
    </main>
  );
}

function Stat({ label, value, hint }: { label: string; value: string; hint?: string }) {
  return (
    <div className="p-4 bg-gray-900 rounded-lg border border-gray-800">
      <div className="text-xs text-gray-400">{label}</div>
      <div className="text-2xl font-semibold">{value}</div>
      {hint && <div className="text-xs text-gray-500 mt-1">{hint}</div>}
    </div>
  );
}
