import { z } from "zod";
import { pickProperty, RawAnnotation, Resolution } from "./annotation";
import { PixelBox } from "./label";

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema);

const PolygonSchema = z.object({
  type: z.literal("Polygon"),
  coordinates: z.array(RingSchema),
});

const MultiPolygonSchema = z.object({
  type: z.literal("MultiPolygon"),
  coordinates: z.array(z.array(RingSchema)),
});

const GeometrySchema = z.discriminatedUnion("type", [
  PolygonSchema,
  MultiPolygonSchema,
]);

export type Ring = z.infer<typeof RingSchema>;
export type PolygonGeometry = z.infer<typeof GeometrySchema>;

const decimal_pattern = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** parse `"xmin,ymin,xmax,ymax"`, each field a decimal number */
export function parseBoundsString(text: string): PixelBox | null {
  const parts = text.split(",").map((part) => part.trim());
  if (parts.length !== 4 || !parts.every((part) => decimal_pattern.test(part))) {
    return null;
  }
  const [xmin, ymin, xmax, ymax] = parts.map(Number);
  if (![xmin, ymin, xmax, ymax].every(Number.isFinite)) return null;
  return { xmin, ymin, xmax, ymax };
}

export function ringBounds(ring: Ring): PixelBox | null {
  if (ring.length === 0) return null;
  let xmin = Infinity;
  let ymin = Infinity;
  let xmax = -Infinity;
  let ymax = -Infinity;
  for (const [x, y] of ring) {
    xmin = Math.min(xmin, x);
    ymin = Math.min(ymin, y);
    xmax = Math.max(xmax, x);
    ymax = Math.max(ymax, y);
  }
  return { xmin, ymin, xmax, ymax };
}

/** only the outer ring of the first polygon is used */
export function geometryBounds(geometry: PolygonGeometry): PixelBox | null {
  const ring =
    geometry.type === "Polygon"
      ? geometry.coordinates[0]
      : geometry.coordinates[0]?.[0];
  return ring ? ringBounds(ring) : null;
}

/**
 * Resolve the pixel box of an annotation.
 *
 * 1. `bounds_imcoords` as `"xmin,ymin,xmax,ymax"`
 * 2. bounds of the polygon geometry
 *
 * The first encoding that yields a box wins.
 */
export function resolvePixelBox(annotation: RawAnnotation): Resolution<PixelBox> {
  const reasons: string[] = [];

  const bounds = pickProperty(annotation, "bounds");
  if (bounds) {
    const box =
      typeof bounds.value === "string" ? parseBoundsString(bounds.value) : null;
    if (box) return { type: "ok", value: box, key: bounds.key };
    reasons.push(
      `${bounds.key} is not "xmin,ymin,xmax,ymax": ${JSON.stringify(
        bounds.value
      )}`
    );
  }

  if (annotation.geometry !== null && annotation.geometry !== undefined) {
    const geometry = GeometrySchema.safeParse(annotation.geometry);
    const box = geometry.success ? geometryBounds(geometry.data) : null;
    if (box) return { type: "ok", value: box, key: "geometry" };
    reasons.push("geometry is not a non-empty Polygon or MultiPolygon");
  }

  if (reasons.length === 0) return { type: "missing" };
  return { type: "invalid", reason: reasons.join("; ") };
}
