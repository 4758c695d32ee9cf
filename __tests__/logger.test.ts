/**
 * Tests for log redaction.
 *
 * Source: src/sync/logger.ts
 */
import { redactSecrets } from "@/sync/logger";

describe("redactSecrets()", () => {
  it("masks credential-bearing metadata", () => {
    const info = redactSecrets().transform({
      level: "debug",
      message: "Onshape API request",
      Authorization: "On test-access-key:HmacSHA256:c2lnbmF0dXJl",
      secretKey: "test-secret",
      path: "/api/v6/documents",
    });

    expect(info).toEqual({
      level: "debug",
      message: "Onshape API request",
      Authorization: "[redacted]",
      secretKey: "[redacted]",
      path: "/api/v6/documents",
    });
  });
});
