import { readFile } from "fs/promises";
import { z } from "zod";
import { assertFile } from "./fs";

export type RawAnnotation = {
  properties: Record<string, unknown>;
  /** GeoJSON geometry, validated when the box is resolved */
  geometry: unknown;
};

/** outcome of probing a logical field across its accepted property keys */
export type Resolution<T> =
  | { type: "ok"; value: T; key: string }
  | { type: "missing" }
  | { type: "invalid"; reason: string };

/** accepted property keys per logical field, first present key wins */
export const property_keys = {
  image_id: ["image_id"],
  feature_id: ["feature_id"],
  class_id: ["type", "class_type", "type_id"],
  bounds: ["bounds_imcoords"],
} satisfies Record<string, string[]>;

export type PropertyField = keyof typeof property_keys;

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.trim() !== "";
  if (typeof value === "number") return !Number.isNaN(value);
  return true;
}

export function pickProperty(
  annotation: RawAnnotation,
  field: PropertyField
): { key: string; value: unknown } | undefined {
  for (const key of property_keys[field]) {
    const value = annotation.properties[key];
    if (isPresent(value)) return { key, value };
  }
  return undefined;
}

function toIdString(value: unknown): string | undefined {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

/**
 * Resolve the image an annotation belongs to, from `image_id`, or else from
 * `feature_id` in the form `<image_id>.<object_id>`.
 */
export function resolveImageId(annotation: RawAnnotation): Resolution<string> {
  const image_id = pickProperty(annotation, "image_id");
  if (image_id) {
    const value = toIdString(image_id.value);
    if (value) return { type: "ok", value, key: image_id.key };
  }

  const feature_id = pickProperty(annotation, "feature_id");
  if (feature_id) {
    const value = toIdString(feature_id.value)?.split(".")[0];
    if (value) return { type: "ok", value, key: feature_id.key };
  }

  if (image_id || feature_id) {
    return { type: "invalid", reason: "image id is not a string or number" };
  }
  return { type: "missing" };
}

/** raw taxonomy id, an integer given as number or numeric string */
export function resolveClassId(annotation: RawAnnotation): Resolution<number> {
  const picked = pickProperty(annotation, "class_id");
  if (!picked) return { type: "missing" };

  const { key, value } = picked;
  const id =
    typeof value === "number"
      ? value
      : typeof value === "string"
      ? Number(value.trim())
      : NaN;
  if (!Number.isInteger(id)) {
    return {
      type: "invalid",
      reason: `${key} is not an integer: ${JSON.stringify(value)}`,
    };
  }
  return { type: "ok", value: id, key };
}

export type AnnotationIndex = {
  /** image id -> annotations in store order */
  groups: Map<string, RawAnnotation[]>;
  /** records without a resolvable image id */
  unresolved: number;
};

export function buildAnnotationIndex(
  annotations: Iterable<RawAnnotation>
): AnnotationIndex {
  const groups = new Map<string, RawAnnotation[]>();
  let unresolved = 0;
  for (const annotation of annotations) {
    const image_id = resolveImageId(annotation);
    if (image_id.type !== "ok") {
      unresolved++;
      continue;
    }
    let group = groups.get(image_id.value);
    if (!group) {
      group = [];
      groups.set(image_id.value, group);
    }
    group.push(annotation);
  }
  return { groups, unresolved };
}

/** look up by image stem first, then by the filename with extension */
export function findAnnotationGroup(
  index: AnnotationIndex,
  image: { stem: string; filename: string }
): RawAnnotation[] | undefined {
  return index.groups.get(image.stem) ?? index.groups.get(image.filename);
}

const FeatureSchema = z.object({
  type: z.literal("Feature").optional(),
  properties: z.record(z.unknown()).nullable().optional(),
  geometry: z.unknown().optional(),
});

const FeatureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(FeatureSchema),
});

export type AnnotationStore = z.input<typeof FeatureCollectionSchema>;

export function parseAnnotationStore(data: unknown): RawAnnotation[] {
  const result = FeatureCollectionSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(
      `Invalid annotation store, expect a GeoJSON FeatureCollection: ${
        issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : ""
      }`
    );
  }
  return result.data.features.map((feature) => ({
    properties: feature.properties ?? {},
    geometry: feature.geometry ?? null,
  }));
}

/**
 * @param store path of a GeoJSON file, or an already parsed FeatureCollection
 */
export async function loadAnnotationStore(
  store: string | AnnotationStore
): Promise<RawAnnotation[]> {
  if (typeof store !== "string") {
    return parseAnnotationStore(store);
  }
  assertFile(store, "Annotation store");
  const content = await readFile(store, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid annotation store ${store}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }
  return parseAnnotationStore(data);
}
