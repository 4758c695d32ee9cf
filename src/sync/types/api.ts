import { z } from "zod";
import { RESOURCE_TYPES } from "@/sync/types";

export const credentialSchema = z.object({
  accessKey: z.string().min(1, "Onshape access key is required"),
  secretKey: z.string().min(1, "Onshape secret key is required"),
  baseUrl: z.string().url(),
  apiVersion: z.string().min(1),
});

export const resourceTypeSchema = z.enum(RESOURCE_TYPES);

const flag = z
  .union([z.boolean(), z.enum(["true", "false", "1", "0"])])
  .transform((v) => v === true || v === "true" || v === "1");

export const singleSyncRequestSchema = z.object({
  forceRefresh: flag.default(false),
  /** Natural key of one stored parent, e.g. `d/{did}/w/{wid}/e/{eid}` for parts. */
  parentKey: z.string().min(1).optional(),
});

export const resumeSyncRequestSchema = z.object({
  forceRefresh: flag.default(false),
});

export const fullSyncRequestSchema = z.object({
  forceRefresh: flag.default(false),
  documentIds: z.array(z.string().min(1)).min(1).optional(),
});

export const logQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  runId: z.string().uuid().optional(),
  action: z.enum(["created", "updated", "unchanged", "error"]).optional(),
  resourceType: resourceTypeSchema.optional(),
});

export type Credential = Readonly<z.infer<typeof credentialSchema>>;
export type FullSyncRequest = z.infer<typeof fullSyncRequestSchema>;
export type LogQuery = z.infer<typeof logQuerySchema>;
