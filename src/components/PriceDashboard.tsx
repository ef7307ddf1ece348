"use client";

import { useMemo, useState } from "react";
import {
  CartesianGrid,
  Legend,
  Line,
  LineChart,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from "recharts";
import { StationFilter } from "./StationFilter";
import { buildChartSeries, groupByStation } from "@/lib/summary";
import type { PriceEntry } from "@/lib/types";

const COLORS = ["#667eea", "#764ba2", "#f093fb", "#4facfe", "#43e97b", "#fa709a"];

interface PriceDashboardProps {
  history: PriceEntry[];
}

export function PriceDashboard({ history }: PriceDashboardProps) {
  const stations = useMemo(() => Object.keys(groupByStation(history)).sort(), [history]);
  const [selected, setSelected] = useState<string[]>(stations);

  const series = useMemo(() => buildChartSeries(history, selected), [history, selected]);
  const rows = useMemo(
    () => history.filter((e) => selected.includes(e.stationName)).reverse(),
    [history, selected]
  );

  return (
    <div className="space-y-6">
      <StationFilter stations={stations} selected={selected} onChange={setSelected} />

      <div className="h-96 p-4 bg-gray-900 rounded-lg border border-gray-800">
        <ResponsiveContainer width="100%" height="100%">
          <LineChart data={series} margin={{ top: 16, right: 24, bottom: 8, left: 0 }}>
            <CartesianGrid strokeDasharray="4 4" stroke="#374151" />
            <XAxis dataKey="date" tick={{ fill: "#9ca3af" }} tickMargin={12} />
            <YAxis
              domain={["auto", "auto"]}
              tick={{ fill: "#9ca3af" }}
              tickFormatter={(v: number) => `€${v.toFixed(2)}`}
            />
            <Tooltip formatter={(v) => (typeof v === "number" ? `€${v.toFixed(3)}` : String(v))} />
            <Legend />
            {stations
              .filter((station) => selected.includes(station))
              .map((station) => (
                <Line
                  key={station}
                  type="monotone"
                  dataKey={station}
                  stroke={COLORS[stations.indexOf(station) % COLORS.length]}
                  strokeWidth={2}
                  dot={{ r: 4 }}
                  connectNulls
                />
              ))}
          </LineChart>
        </ResponsiveContainer>
      </div>

      <div className="overflow-x-auto bg-gray-900 rounded-lg border border-gray-800">
        <table className="w-full text-sm">
          <thead>
            <tr className="text-left text-gray-400 border-b border-gray-800">
              <th className="p-3">Station</th>
              <th className="p-3">Date</th>
              <th className="p-3">Price</th>
              <th className="p-3">Fuel</th>
              <th className="p-3">Postal code</th>
            </tr>
          </thead>
          <tbody>
            {rows.map((e) => (
              <tr
                key={`${e.timestamp}-${e.stationName}-${e.postalCode}`}
                className="border-b border-gray-800 hover:bg-gray-800"
              >
                <td className="p-3">{e.stationName}</td>
                <td className="p-3 text-gray-400">{e.timestamp}</td>
                <td className="p-3 font-semibold">€{e.price.toFixed(3)}</td>
                <td className="p-3">{e.fuelType}</td>
                <td className="p-3">{e.postalCode}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
}
