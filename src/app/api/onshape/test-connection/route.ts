import { NextResponse } from "next/server";
import { getSyncEngine } from "@/sync/engine";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("api-test-connection");

/** GET /api/onshape/test-connection: One signed call to users/current. */
export async function GET() {
  try {
    const result = await getSyncEngine().client.testConnection();
    if (!result.connected) {
      return NextResponse.json(
        { connected: false, error: "Onshape connection failed", message: result.error },
        { status: 502 },
      );
    }
    return NextResponse.json({ connected: true, user: result.user });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error("Connection test could not run", { error: message });
    return NextResponse.json({ error: "Configuration error", message }, { status: 500 });
  }
}
