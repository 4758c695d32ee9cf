import { z } from "zod";
import { RESOURCE_TYPES, type ParentRef, type RemoteEntity, type ResourceType } from "@/sync/types";
import { getDatabase } from "./db";
import { MIRROR_TABLES, type LocalRecord } from "./types";

// --- Mirror records ---

export function findRecord(resourceType: ResourceType, key: string): LocalRecord | undefined {
  const row = getDatabase()
    .prepare<[string], RawRecordRow>(`SELECT * FROM ${MIRROR_TABLES[resourceType]} WHERE key = ?`)
    .get(key);
  return row ? toLocalRecord(resourceType, row) : undefined;
}

export function recordExists(resourceType: ResourceType, key: string): boolean {
  const row = getDatabase()
    .prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${MIRROR_TABLES[resourceType]} WHERE key = ?`)
    .get(key);
  return row !== undefined;
}

export function insertRecord(entity: RemoteEntity, now: string): void {
  const params = toRowParams(entity, now);
  const columns = Object.keys(params);
  getDatabase()
    .prepare<RowParams>(`
      INSERT INTO ${MIRROR_TABLES[entity.resourceType]} (${columns.join(", ")}, created_at)
      VALUES (${columns.map((c) => `@${c}`).join(", ")}, @updated_at)
    `)
    .run(params);
}

export function updateRecord(entity: RemoteEntity, now: string): void {
  const params = toRowParams(entity, now);
  const assignments = Object.keys(params)
    .filter((c) => c !== "key")
    .map((c) => `${c} = @${c}`);
  getDatabase()
    .prepare<RowParams>(`UPDATE ${MIRROR_TABLES[entity.resourceType]} SET ${assignments.join(", ")} WHERE key = @key`)
    .run(params);
}

/**
 * Stored records of one type, as roots for a walk of the level below.
 * `elementType` narrows elements to one kind (part studios for parts/features).
 */
export function listParents(resourceType: ResourceType, options: { elementType?: string } = {}): ParentRef[] {
  const table = MIRROR_TABLES[resourceType];
  const db = getDatabase();
  const rows =
    resourceType === "element" && options.elementType
      ? db.prepare<[string], RawRecordRow>(`SELECT * FROM ${table} WHERE element_type = ? ORDER BY created_at, key`).all(options.elementType)
      : db.prepare<[], RawRecordRow>(`SELECT * FROM ${table} ORDER BY created_at, key`).all();

  return rows.map((row) => toParentRef(toLocalRecord(resourceType, row)));
}

/** One stored record as the root of a walk, or undefined when it is not mirrored. */
export function findParent(resourceType: ResourceType, key: string): ParentRef | undefined {
  const record = findRecord(resourceType, key);
  return record ? toParentRef(record) : undefined;
}

export function countRecords(): Record<ResourceType, number> {
  const db = getDatabase();
  const counts: Record<ResourceType, number> = { document: 0, workspace: 0, element: 0, part: 0, feature: 0 };
  for (const type of RESOURCE_TYPES) {
    const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${MIRROR_TABLES[type]}`).get();
    counts[type] = row?.n ?? 0;
  }
  return counts;
}

// --- Internal helpers ---

interface RawRecordRow {
  key: string;
  parent_key: string | null;
  document_id: string;
  workspace_id: string | null;
  element_id: string | null;
  remote_id: string;
  name: string;
  element_type?: string | null;
  revision: string;
  attributes_json: string;
  last_synced_at: string;
  created_at: string;
  updated_at: string;
}

type RowParams = Record<string, string | null>;

const attributesSchema = z.record(z.unknown());

function remoteIdOf(entity: RemoteEntity): string {
  const { ids } = entity;
  const id = {
    document: ids.documentId,
    workspace: ids.workspaceId,
    element: ids.elementId,
    part: ids.partId,
    feature: ids.featureId,
  }[entity.resourceType];
  if (!id) {
    throw new TypeError(`${entity.resourceType} ${entity.key} has no remote ID`);
  }
  return id;
}

function toRowParams(entity: RemoteEntity, now: string): RowParams {
  const params: RowParams = {
    key: entity.key,
    parent_key: entity.parentKey,
    document_id: entity.ids.documentId,
    workspace_id: entity.ids.workspaceId ?? null,
    element_id: entity.ids.elementId ?? null,
    remote_id: remoteIdOf(entity),
    name: entity.name,
    revision: entity.revision,
    attributes_json: JSON.stringify(entity.attributes),
    last_synced_at: now,
    updated_at: now,
  };
  if (entity.resourceType === "element") {
    params.element_type = entity.elementType ?? null;
  }
  return params;
}

function toParentRef(record: LocalRecord): ParentRef {
  return {
    resourceType: record.resourceType,
    key: record.key,
    ids: {
      documentId: record.documentId,
      ...(record.workspaceId ? { workspaceId: record.workspaceId } : {}),
      ...(record.elementId ? { elementId: record.elementId } : {}),
    },
    elementType: record.elementType,
  };
}

function toLocalRecord(resourceType: ResourceType, row: RawRecordRow): LocalRecord {
  return {
    key: row.key,
    resourceType,
    parentKey: row.parent_key,
    documentId: row.document_id,
    workspaceId: row.workspace_id,
    elementId: row.element_id,
    remoteId: row.remote_id,
    name: row.name,
    elementType: row.element_type ?? null,
    revision: row.revision,
    attributes: attributesSchema.parse(JSON.parse(row.attributes_json)),
    lastSyncedAt: row.last_synced_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
