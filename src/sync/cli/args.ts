import { resourceTypeSchema } from "@/sync/types/api";
import type { SyncScope } from "@/sync/types";

export interface CliOptions {
  auto: boolean;
  forceRefresh: boolean;
  scope: SyncScope;
  /** True when a flag picked the scope, so the prompt is skipped. */
  scopeGiven: boolean;
}

/**
 * `--auto` (or `--once`) runs headless. `--type=<resource>` syncs one
 * level, under `--parent=<key>` only when given. `--documents=id1,id2`
 * narrows a full cascade. `--resume=<runId>` retries the failed pages of a
 * finished run. `--force` rewrites every mirrored row.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const value = (name: string) => args.find((a) => a.startsWith(`--${name}=`))?.slice(name.length + 3);

  const type = value("type");
  const parent = value("parent");
  const resume = value("resume");
  const documents = value("documents")
    ?.split(",")
    .map((id) => id.trim())
    .filter(Boolean);

  let scope: SyncScope = { kind: "full" };
  if (resume !== undefined) {
    if (!resume) throw new Error("--resume needs the ID of a finished run");
    scope = { kind: "resume", runId: resume };
  } else if (type !== undefined && type !== "full") {
    const parsed = resourceTypeSchema.safeParse(type);
    if (!parsed.success) {
      throw new Error(`--type must be full or one of ${resourceTypeSchema.options.join(", ")}, got "${type}"`);
    }
    scope = parent ? { kind: "single", resourceType: parsed.data, parentKey: parent } : { kind: "single", resourceType: parsed.data };
  } else if (parent !== undefined) {
    throw new Error("--parent needs --type=<resource> for the level to sync under it");
  } else if (documents && documents.length > 0) {
    scope = { kind: "full", documentIds: documents };
  }

  return {
    auto: args.includes("--auto") || args.includes("--once"),
    forceRefresh: args.includes("--force"),
    scope,
    scopeGiven: type !== undefined || documents !== undefined || resume !== undefined,
  };
}
