import { NextRequest, NextResponse } from "next/server";
import { openStore } from "@/lib/store";
import { buildPricesResponse } from "@/lib/summary";

export const dynamic = "force-dynamic";

export async function GET(request: NextRequest) {
  try {
    const { searchParams } = new URL(request.url);
    const history = openStore().getHistory();

    return NextResponse.json(buildPricesResponse(history, searchParams.get("station")));
  } catch (error) {
    console.error("[api/prices] Error:", error);
    return NextResponse.json(
      {
        error: error instanceof Error ? error.message : "Failed to load prices",
      },
      { status: 500 }
    );
  }
}
