"use client";

import { useRouter } from "next/navigation";

export function RefreshButton() {
  const router = useRouter();

  return (
    <button
      type="button"
      onClick={() => router.refresh()}
      className="px-3 py-1.5 text-sm bg-blue-600 hover:bg-blue-500 rounded"
    >
      Refresh
    </button>
  );
}
