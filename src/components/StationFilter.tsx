"use client";

interface StationFilterProps {
  stations: string[];
  selected: string[];
  onChange: (selected: string[]) => void;
}

export function StationFilter({ stations, selected, onChange }: StationFilterProps) {
  const toggle = (station: string) => {
    onChange(
      selected.includes(station)
        ? selected.filter((s) => s !== station)
        : [...selected, station]
    );
  };

  return (
    <div className="flex flex-wrap items-center gap-4 p-4 bg-gray-900 rounded-lg border border-gray-800">
      <span className="text-xs text-gray-400">Stations</span>
      {stations.map((station) => (
        <label key={station} className="flex items-center gap-2 text-sm cursor-pointer select-none">
          <input
            type="checkbox"
            checked={selected.includes(station)}
            onChange={() => toggle(station)}
            className="w-4 h-4"
          />
          {station}
        </label>
      ))}
    </div>
  );
}
