/**
 * Jest Setup File
 *
 * Test environment and global mocks for all tests.
 */

// Placeholder credentials and an in-memory ledger
process.env.ONSHAPE_ACCESS_KEY = "test-access-key";
process.env.ONSHAPE_SECRET_KEY = "test-secret";
process.env.ONSHAPE_BASE_URL = "https://cad.example.test/api";
process.env.ONSHAPE_API_VERSION = "v6";
process.env.SYNC_LEDGER_PATH = ":memory:";
process.env.SYNC_LOG_SILENT = "true";

// Mock NextResponse since it's not available outside Next.js runtime
jest.mock("next/server", () => ({
  NextResponse: {
    json: (body: unknown, init?: { status?: number; headers?: Record<string, string> }) => ({
      body,
      status: init?.status || 200,
      headers: init?.headers || {},
      json: async () => body,
    }),
  },
}));
