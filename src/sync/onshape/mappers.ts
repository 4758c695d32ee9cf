import type { ParentRef, RemoteEntity, ResourceType } from "@/sync/types";
import { hashEntity } from "@/sync/ledger/hash";
import { onshapeMassPropertiesSchema } from "./types";
import type {
  OnshapeDocument,
  OnshapeWorkspace,
  OnshapeElement,
  OnshapePart,
  OnshapeFeature,
} from "./types";

const KEY_SEGMENT: Record<ResourceType, string> = {
  document: "d",
  workspace: "w",
  element: "e",
  part: "p",
  feature: "f",
};

/** Natural keys follow the Onshape URL shape: `d/{did}/w/{wid}/e/{eid}/p/{partId}`. */
export function entityKey(parent: ParentRef | null, resourceType: ResourceType, id: string): string {
  const segment = `${KEY_SEGMENT[resourceType]}/${id}`;
  return parent ? `${parent.key}/${segment}` : segment;
}

function revisionOf(marker: string | null | undefined, raw: Record<string, unknown>): string {
  return marker || `sha256:${hashEntity(raw)}`;
}

export function mapDocument(raw: OnshapeDocument): RemoteEntity {
  return {
    resourceType: "document",
    key: entityKey(null, "document", raw.id),
    parentKey: null,
    ids: { documentId: raw.id },
    name: raw.name,
    revision: revisionOf(raw.modifiedAt, raw),
    attributes: {
      description: raw.description ?? null,
      ownerId: raw.owner?.id ?? null,
      ownerName: raw.owner?.name ?? null,
      public: raw.public ?? false,
      createdAt: raw.createdAt ?? null,
    },
  };
}

export function mapWorkspace(raw: OnshapeWorkspace, parent: ParentRef): RemoteEntity {
  return {
    resourceType: "workspace",
    key: entityKey(parent, "workspace", raw.id),
    parentKey: parent.key,
    ids: { ...parent.ids, workspaceId: raw.id },
    name: raw.name,
    revision: revisionOf(raw.modifiedAt, raw),
    attributes: {
      description: raw.description ?? null,
      isMain: raw.isMain ?? false,
    },
  };
}

export function mapElement(raw: OnshapeElement, parent: ParentRef): RemoteEntity {
  return {
    resourceType: "element",
    key: entityKey(parent, "element", raw.id),
    parentKey: parent.key,
    ids: { ...parent.ids, elementId: raw.id },
    name: raw.name,
    revision: revisionOf(raw.microversionId, raw),
    elementType: raw.elementType ?? null,
    attributes: {
      dataType: raw.dataType ?? null,
      thumbnailId: raw.thumbnailId ?? null,
    },
  };
}

export function mapPart(raw: OnshapePart, parent: ParentRef): RemoteEntity {
  return {
    resourceType: "part",
    key: entityKey(parent, "part", raw.partId),
    parentKey: parent.key,
    ids: { ...parent.ids, partId: raw.partId },
    name: raw.name,
    revision: revisionOf(raw.microversionId, raw),
    attributes: {
      state: raw.state ?? null,
      bodyType: raw.bodyType ?? null,
      materialProperties: raw.materialProperties ?? null,
      appearance: raw.appearance ?? null,
    },
  };
}

/**
 * Attach the mass properties response to a part. Anything but an object,
 * including a failed fetch, is stored as null.
 */
export function withMassProperties(part: RemoteEntity, payload: unknown): RemoteEntity {
  const parsed = onshapeMassPropertiesSchema.safeParse(payload);
  return {
    ...part,
    attributes: { ...part.attributes, massProperties: parsed.success ? parsed.data : null },
  };
}

export function mapFeature(raw: OnshapeFeature, parent: ParentRef): RemoteEntity {
  return {
    resourceType: "feature",
    key: entityKey(parent, "feature", raw.featureId),
    parentKey: parent.key,
    ids: { ...parent.ids, featureId: raw.featureId },
    name: raw.name,
    // Features carry no per-item marker, so any content change is a new revision
    revision: revisionOf(null, raw),
    attributes: {
      featureType: raw.featureType ?? null,
      suppressed: raw.suppressed ?? false,
      parameters: raw.parameters ?? null,
    },
  };
}

export function toParentRef(entity: RemoteEntity): ParentRef {
  return {
    resourceType: entity.resourceType,
    key: entity.key,
    ids: entity.ids,
    elementType: entity.elementType ?? null,
  };
}
