/**
 * Quick test: verify Onshape API keys work
 * Run: npx tsx scripts/test-connection.ts
 */

import { config } from "dotenv";
config({ path: ".env.local" });

import { getCredential } from "@/sync/config/env";
import { OnshapeClient } from "@/sync/onshape/client";

async function main() {
  const credential = getCredential();
  console.log("🔑 Testing Onshape API connection\n");
  console.log(`Base URL:    ${credential.baseUrl}`);
  console.log(`API version: ${credential.apiVersion}`);
  console.log(`Access key:  ${credential.accessKey.slice(0, 4)}…\n`);

  const client = new OnshapeClient(credential);
  const result = await client.testConnection();
  if (!result.connected) {
    console.error(`❌ Request failed: ${result.error}`);
    process.exitCode = 1;
    return;
  }
  console.log(`✅ Signed in as ${result.user.name ?? result.user.id}`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
