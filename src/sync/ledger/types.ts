import type { ResourceType, SyncAction, SyncCounts, SyncRun, SyncRunStatus } from "@/sync/types";

export const MIRROR_TABLES: Record<ResourceType, string> = {
  document: "documents",
  workspace: "workspaces",
  element: "elements",
  part: "parts",
  feature: "features",
};

export interface LocalRecord {
  key: string;
  resourceType: ResourceType;
  parentKey: string | null;
  documentId: string;
  workspaceId: string | null;
  elementId: string | null;
  remoteId: string;
  name: string;
  elementType: string | null;
  revision: string;
  attributes: Record<string, unknown>;
  lastSyncedAt: string;
  createdAt: string;
  updatedAt: string;
}

export interface LogPage<T> {
  items: T[];
  total: number;
  offset: number;
  limit: number;
}

export interface RecentRun {
  runId: string;
  scope: SyncRun["scope"];
  status: SyncRunStatus;
  startedAt: string;
  completedAt: string | null;
  counts: SyncCounts;
}

export interface SyncStats {
  records: Record<ResourceType, number>;
  runs: Record<SyncRunStatus, number>;
  actions: Record<SyncAction, number>;
  recentRuns: RecentRun[];
}
