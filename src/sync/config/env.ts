import { z } from "zod";
import { credentialSchema, type Credential } from "@/sync/types/api";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ONSHAPE_ACCESS_KEY: z.string().min(1, "ONSHAPE_ACCESS_KEY is required"),
  ONSHAPE_SECRET_KEY: z.string().min(1, "ONSHAPE_SECRET_KEY is required"),
  ONSHAPE_BASE_URL: z.string().url().default("https://cad.onshape.com/api"),
  ONSHAPE_API_VERSION: z.string().regex(/^v\d+$/, "ONSHAPE_API_VERSION must look like v6").default("v6"),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),
  SYNC_LEDGER_PATH: z
    .string()
    .default("./cad_mirror.db"),

  // Walker / governor tuning
  SYNC_PAGE_SIZE: positiveInt(20),
  SYNC_MAX_CONCURRENCY: positiveInt(4),
  SYNC_MAX_ATTEMPTS: positiveInt(5),
  SYNC_BACKOFF_BASE_MS: positiveInt(500),
  SYNC_BACKOFF_MAX_MS: positiveInt(30_000),
  SYNC_WORKERS: positiveInt(1),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;
let _credential: Credential | null = null;

export function getEnv(): SyncEnv {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const missing = result.error.issues
        .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw new Error(
        `Sync environment validation failed:\n${missing}\n\nCopy .env.example to .env.local and fill in the values.`
      );
    }
    _env = result.data;
  }
  return _env;
}

/** The API credential, read once per process and frozen. */
export function getCredential(): Credential {
  if (!_credential) {
    const env = getEnv();
    _credential = Object.freeze(credentialSchema.parse({
      accessKey: env.ONSHAPE_ACCESS_KEY,
      secretKey: env.ONSHAPE_SECRET_KEY,
      baseUrl: env.ONSHAPE_BASE_URL,
      apiVersion: env.ONSHAPE_API_VERSION,
    }));
  }
  return _credential;
}

/** Drops the cached environment. Tests only. */
export function resetEnv(): void {
  _env = null;
  _credential = null;
}
