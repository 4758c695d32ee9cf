import type { ZodTypeAny, z } from "zod";
import type { HierarchyIds, ParentRef, RemoteEntity, ResourceType } from "@/sync/types";
import { MalformedResponseError } from "@/sync/errors";
import { mapDocument, mapElement, mapFeature, mapPart, mapWorkspace, withMassProperties } from "./mappers";
import { OffsetPagination, SinglePage, type PaginationStrategy } from "./pagination";
import type { QueryParams } from "./signing";
import {
  PART_STUDIO,
  onshapeDocumentSchema,
  onshapeElementSchema,
  onshapeFeatureSchema,
  onshapePartSchema,
  onshapeWorkspaceSchema,
} from "./types";

/** A second request per decoded item whose answer is folded into the entity. */
export interface Enrichment {
  endpoint(entity: RemoteEntity): string;
  query(entity: RemoteEntity): QueryParams;
  /** `payload` is null when the request failed; the entity is mirrored either way. */
  apply(entity: RemoteEntity, payload: unknown): RemoteEntity;
}

export interface ResourceDescriptor {
  type: ResourceType;
  parentType: ResourceType | null;
  pagination: PaginationStrategy;
  /** Fixed query parameters sent with every page. */
  query: QueryParams;
  endpoint(parent: ParentRef | null): string;
  /** Throws `MalformedResponseError` when the item cannot be mirrored. */
  decode(item: unknown, parent: ParentRef | null): RemoteEntity;
  enrichment?: Enrichment;
}

function decodeWith<S extends ZodTypeAny>(
  schema: S,
  type: ResourceType,
  item: unknown,
): z.output<S> {
  const parsed = schema.safeParse(item);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new MalformedResponseError(`Undecodable ${type}: ${issues}`);
  }
  return parsed.data;
}

function requireParent(parent: ParentRef | null, type: ResourceType, expected: ResourceType): ParentRef {
  if (!parent || parent.resourceType !== expected) {
    throw new TypeError(`A ${type} walk needs a ${expected} parent, got ${parent?.resourceType ?? "none"}`);
  }
  return parent;
}

function requireId(ids: HierarchyIds, field: "workspaceId" | "elementId"): string {
  const id = ids[field];
  if (!id) {
    throw new TypeError(`Parent is missing ${field}`);
  }
  return id;
}

function studioPath(ids: HierarchyIds): string {
  return `d/${ids.documentId}/w/${requireId(ids, "workspaceId")}/e/${requireId(ids, "elementId")}`;
}

function partStudioPath(parent: ParentRef | null, type: ResourceType): string {
  return studioPath(requireParent(parent, type, "element").ids);
}

export const RESOURCES: Record<ResourceType, ResourceDescriptor> = {
  document: {
    type: "document",
    parentType: null,
    pagination: new OffsetPagination("items"),
    query: { sortColumn: "createdAt", sortOrder: "asc" },
    endpoint: () => "documents",
    decode: (item) => mapDocument(decodeWith(onshapeDocumentSchema, "document", item)),
  },
  workspace: {
    type: "workspace",
    parentType: "document",
    pagination: new SinglePage(),
    query: {},
    endpoint: (parent) => {
      const document = requireParent(parent, "workspace", "document");
      return `documents/d/${document.ids.documentId}/workspaces`;
    },
    decode: (item, parent) =>
      mapWorkspace(decodeWith(onshapeWorkspaceSchema, "workspace", item), requireParent(parent, "workspace", "document")),
  },
  element: {
    type: "element",
    parentType: "workspace",
    pagination: new SinglePage(),
    query: {},
    endpoint: (parent) => {
      const workspace = requireParent(parent, "element", "workspace");
      return `documents/d/${workspace.ids.documentId}/w/${requireId(workspace.ids, "workspaceId")}/elements`;
    },
    decode: (item, parent) =>
      mapElement(decodeWith(onshapeElementSchema, "element", item), requireParent(parent, "element", "workspace")),
  },
  part: {
    type: "part",
    parentType: "element",
    pagination: new SinglePage(),
    query: {},
    endpoint: (parent) => `parts/${partStudioPath(parent, "part")}`,
    decode: (item, parent) =>
      mapPart(decodeWith(onshapePartSchema, "part", item), requireParent(parent, "part", "element")),
    enrichment: {
      endpoint: (part) => `partstudios/${studioPath(part.ids)}/massproperties`,
      query: (part) => ({ partId: part.ids.partId }),
      apply: withMassProperties,
    },
  },
  feature: {
    type: "feature",
    parentType: "element",
    pagination: new SinglePage("features"),
    query: {},
    endpoint: (parent) => `partstudios/${partStudioPath(parent, "feature")}/features`,
    decode: (item, parent) =>
      mapFeature(decodeWith(onshapeFeatureSchema, "feature", item), requireParent(parent, "feature", "element")),
  },
};

/** The levels walked under a committed parent during a full cascade. */
export function childTypesOf(parent: ParentRef): ResourceType[] {
  switch (parent.resourceType) {
    case "document":
      return ["workspace"];
    case "workspace":
      return ["element"];
    case "element":
      // Only part studios have parts and a feature list
      return parent.elementType === PART_STUDIO ? ["part", "feature"] : [];
    default:
      return [];
  }
}

export function parentTypeOf(type: ResourceType): ResourceType | null {
  return RESOURCES[type].parentType;
}
