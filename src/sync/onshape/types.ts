import { z } from "zod";

// Raw Onshape payload shapes. Only the fields the mirror reads are declared;
// everything else passes through untouched and feeds the content hash.

export const onshapeDocumentSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().default(""),
    description: z.string().nullish(),
    createdAt: z.string().nullish(),
    modifiedAt: z.string().nullish(),
    public: z.boolean().nullish(),
    owner: z
      .object({
        id: z.string().nullish(),
        name: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const onshapeWorkspaceSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().default(""),
    description: z.string().nullish(),
    isMain: z.boolean().nullish(),
    modifiedAt: z.string().nullish(),
  })
  .passthrough();

export const onshapeElementSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().default(""),
    elementType: z.string().nullish(),
    dataType: z.string().nullish(),
    thumbnailId: z.string().nullish(),
    microversionId: z.string().nullish(),
  })
  .passthrough();

export const onshapePartSchema = z
  .object({
    partId: z.string().min(1),
    name: z.string().default(""),
    state: z.string().nullish(),
    bodyType: z.string().nullish(),
    microversionId: z.string().nullish(),
    materialProperties: z.unknown().optional(),
    appearance: z.unknown().optional(),
  })
  .passthrough();

export const onshapeFeatureSchema = z
  .object({
    featureId: z.string().min(1),
    name: z.string().default(""),
    featureType: z.string().nullish(),
    suppressed: z.boolean().nullish(),
    parameters: z.unknown().optional(),
  })
  .passthrough();

/** `massproperties` answers with per-body figures; kept as returned. */
export const onshapeMassPropertiesSchema = z.record(z.unknown());

export type OnshapeDocument = z.infer<typeof onshapeDocumentSchema>;
export type OnshapeWorkspace = z.infer<typeof onshapeWorkspaceSchema>;
export type OnshapeElement = z.infer<typeof onshapeElementSchema>;
export type OnshapePart = z.infer<typeof onshapePartSchema>;
export type OnshapeFeature = z.infer<typeof onshapeFeatureSchema>;

export const PART_STUDIO = "PARTSTUDIO";
