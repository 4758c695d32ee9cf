export const RESOURCE_TYPES = ["document", "workspace", "element", "part", "feature"] as const;

export type ResourceType = (typeof RESOURCE_TYPES)[number];

/** IDs of every ancestor level an entity sits under, plus its own. */
export interface HierarchyIds {
  documentId: string;
  workspaceId?: string;
  elementId?: string;
  partId?: string;
  featureId?: string;
}

/** A parent an enumeration is rooted at. */
export interface ParentRef {
  resourceType: ResourceType;
  key: string;
  ids: HierarchyIds;
  elementType?: string | null;
}

export interface RemoteEntity {
  resourceType: ResourceType;
  key: string;
  parentKey: string | null;
  ids: HierarchyIds;
  name: string;
  revision: string;
  elementType?: string | null;
  attributes: Record<string, unknown>;
}

export type SyncAction = "created" | "updated" | "unchanged" | "error";

export type SyncErrorKind =
  | "auth"
  | "network"
  | "http_status"
  | "malformed_response"
  | "exhausted"
  | "rate_limited"
  | "orphaned_parent"
  | "internal";

/**
 * What a run walks. `single` with a `parentKey` re-syncs one level under one
 * stored parent; `resume` retries the failed pages of a finished run.
 */
export type SyncScope =
  | { kind: "single"; resourceType: ResourceType; parentKey?: string }
  | { kind: "full"; documentIds?: string[] }
  | { kind: "resume"; runId: string };

export type SyncRunStatus = "pending" | "running" | "succeeded" | "partiallyFailed" | "failed";

export interface SyncCounts {
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
}

export interface SyncRun {
  runId: string;
  scope: SyncScope;
  forceRefresh: boolean;
  status: SyncRunStatus;
  startedAt: string;
  completedAt: string | null;
  cancelRequested: boolean;
  message: string | null;
  counts: SyncCounts;
}

/**
 * Offset cursors resume numbered pages; token cursors resume continuation
 * pages and carry the position of their first item. `start` is the first
 * page of an endpoint that takes no cursor.
 */
export type PageCursor =
  | { kind: "start" }
  | { kind: "offset"; offset: number }
  | { kind: "token"; token: string; position?: number };

export const START_CURSOR: PageCursor = { kind: "start" };

export interface SyncLogEntry {
  id: number;
  runId: string;
  resourceType: ResourceType;
  entityKey: string;
  action: SyncAction;
  errorKind: SyncErrorKind | null;
  detail: string | null;
  cursor: PageCursor | null;
  createdAt: string;
}

/** What the reconciler or walker reports before an entry gets its row ID. */
export type SyncOutcome = Omit<SyncLogEntry, "id" | "runId" | "createdAt">;

export function isTerminal(status: SyncRunStatus): boolean {
  return status === "succeeded" || status === "partiallyFailed" || status === "failed";
}
