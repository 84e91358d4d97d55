import { writeFile } from "fs/promises";
import { join } from "path";
import sharp from "sharp";
import {
  AnnotationIndex,
  AnnotationStore,
  buildAnnotationIndex,
  findAnnotationGroup,
  loadAnnotationStore,
  RawAnnotation,
  resolveClassId,
} from "./annotation";
import { ClassConfigOptions, ClassMap, loadClassMap } from "./class-map";
import {
  assertDirectory,
  cachedMkdir,
  getImageFiles,
  ImageFile,
  toLabelFilename,
} from "./fs";
import { resolvePixelBox } from "./geometry";
import {
  ImageSize,
  normalizeBox,
  NormalizedBox,
  toDetectLabelFileContent,
} from "./label";

export type ConversionStats = {
  /** image files found in the image directory */
  total_images: number;
  /** images with a non-empty label file written */
  processed_images: number;
  /** images that could not be decoded */
  skipped_images: number;
  total_objects: number;
  /** raw taxonomy id -> number of boxes written */
  objects_by_class: Map<number, number>;
  invalid_annotations: number;
  /** stems of the skipped images */
  missing_images: string[];
};

export function createConversionStats(): ConversionStats {
  return {
    total_images: 0,
    processed_images: 0,
    skipped_images: 0,
    total_objects: 0,
    objects_by_class: new Map(),
    invalid_annotations: 0,
    missing_images: [],
  };
}

export type ConvertDatasetOptions = {
  /** path of the GeoJSON annotation store, or the parsed FeatureCollection */
  annotations: string | AnnotationStore;
  /** e.g. `"xview/train_images"` */
  images_dir: string;
  /** directory receiving one `<stem>.txt` per image */
  output_dir: string;
  class_config?: ClassConfigOptions;
};

/** decode the whole image, so truncated files are rejected */
export async function readImageSize(path: string): Promise<ImageSize | null> {
  try {
    const { info } = await sharp(path, { failOn: "truncated" })
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (!info.width || !info.height) return null;
    return { width: info.width, height: info.height };
  } catch (error) {
    console.warn(
      `Warning: cannot decode image ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return null;
  }
}

/**
 * Normalize the boxes of one image's annotation group.
 *
 * Unknown classes and degenerate boxes are dropped silently, malformed class
 * ids and unresolvable geometry count as invalid annotations.
 */
export function convertAnnotationGroup(options: {
  annotations: RawAnnotation[];
  class_map: ClassMap;
  size: ImageSize;
  stats: ConversionStats;
}): NormalizedBox[] {
  const { annotations, class_map, size, stats } = options;
  const boxes: NormalizedBox[] = [];

  for (const annotation of annotations) {
    const class_id = resolveClassId(annotation);
    if (class_id.type === "invalid") {
      stats.invalid_annotations++;
      continue;
    }
    if (class_id.type === "missing") continue;

    const class_idx = class_map.index_by_id.get(class_id.value);
    if (class_idx === undefined) continue;

    const pixel_box = resolvePixelBox(annotation);
    if (pixel_box.type !== "ok") {
      stats.invalid_annotations++;
      continue;
    }

    const box = normalizeBox(class_idx, pixel_box.value, size);
    if (!box) continue;

    boxes.push(box);
    stats.objects_by_class.set(
      class_id.value,
      (stats.objects_by_class.get(class_id.value) ?? 0) + 1
    );
  }

  return boxes;
}

async function convertImage(options: {
  image: ImageFile;
  index: AnnotationIndex;
  class_map: ClassMap;
  output_dir: string;
  stats: ConversionStats;
}) {
  const { image, index, class_map, output_dir, stats } = options;
  const label_path = join(output_dir, toLabelFilename(image.filename));

  const size = await readImageSize(image.path);
  if (!size) {
    stats.skipped_images++;
    stats.missing_images.push(image.stem);
    return;
  }

  const annotations = findAnnotationGroup(index, image);
  if (!annotations) {
    // background image
    await writeFile(label_path, "");
    return;
  }

  const boxes = convertAnnotationGroup({ annotations, class_map, size, stats });

  // a matched group with every annotation filtered out gets no label file
  if (boxes.length === 0) return;

  await writeFile(
    label_path,
    toDetectLabelFileContent(boxes, class_map.class_names.length)
  );
  stats.processed_images++;
  stats.total_objects += boxes.length;
}

/**
 * Convert the GeoJSON annotation store into one YOLO label file per image.
 *
 * Images are processed one at a time. Per-image and per-annotation failures
 * are counted in the returned stats, while missing inputs and malformed
 * configuration throw before anything is written.
 */
export async function convertDataset(
  options: ConvertDatasetOptions
): Promise<ConversionStats> {
  const { images_dir, output_dir } = options;

  await assertDirectory(images_dir, "Image");
  const records = await loadAnnotationStore(options.annotations);
  const class_map = await loadClassMap(options.class_config);

  const index = buildAnnotationIndex(records);
  const images = await getImageFiles(images_dir);

  console.log(`Loaded ${records.length} annotations`);
  console.log(`Found ${images.length} images`);
  console.log(`Using ${class_map.class_names.length} classes`);
  console.log(`Found annotations for ${index.groups.size} images`);

  const stats = createConversionStats();
  stats.total_images = images.length;
  stats.invalid_annotations += index.unresolved;

  await cachedMkdir(output_dir);
  for (const image of images) {
    await convertImage({
      image,
      index,
      class_map,
      output_dir,
      stats,
    });
  }

  console.log(formatConversionReport(stats, class_map));
  return stats;
}

export function formatConversionReport(
  stats: ConversionStats,
  class_map?: ClassMap
): string {
  const lines: string[] = [];
  const divider = "=".repeat(60);
  lines.push(divider);
  lines.push("CONVERSION STATISTICS");
  lines.push(divider);
  lines.push(`Total images found: ${stats.total_images}`);
  lines.push(`Images processed: ${stats.processed_images}`);
  lines.push(`Images skipped: ${stats.skipped_images}`);
  lines.push(`Total objects: ${stats.total_objects}`);
  lines.push(`Invalid annotations: ${stats.invalid_annotations}`);
  lines.push(``);
  lines.push(`Objects by class:`);
  const class_ids = Array.from(stats.objects_by_class.keys()).sort(
    (a, b) => a - b
  );
  for (const class_id of class_ids) {
    const class_idx = class_map?.index_by_id.get(class_id);
    const name =
      class_idx === undefined ? "" : ` (${class_map?.class_names[class_idx]})`;
    lines.push(
      `  Class ${class_id}${name}: ${stats.objects_by_class.get(class_id)}`
    );
  }
  if (stats.missing_images.length > 0) {
    lines.push(``);
    lines.push(
      `Missing images (first 10): ${stats.missing_images
        .slice(0, 10)
        .join(", ")}`
    );
  }
  lines.push(divider);
  return lines.join("\n");
}
