import { existsSync } from "fs";
import { copyFile, readFile } from "fs/promises";
import { join } from "path";
import { getDirFilenames } from "@beenotung/tslib/fs";
import { extract_lines } from "@beenotung/tslib/string";
import {
  assertDirectory,
  cachedMkdir,
  getImageFiles,
  ImageFile,
  isDirectory,
  toLabelFilename,
} from "./fs";
import { GroupCounts, GroupRatio, GroupType, group_types } from "./group";
import { parseDetectLabelString } from "./label";
import { createRng, normalizeSeed, shuffle } from "./rng";

export const ratio_tolerance = 0.01;

export type SplitStrategy = "random" | "stratified";

export type SamplePair = {
  image: ImageFile;
  /** full path of the label file */
  label: string;
};

export type SplitDatasetOptions = {
  images_dir: string;
  labels_dir: string;
  /** receives `images/{train,val,test}` and `labels/{train,val,test}` */
  output_dir: string;
  train_ratio: number;
  val_ratio: number;
  test_ratio: number;
  seed: number;
  /** default `"random"` */
  strategy?: SplitStrategy;
};

export function validateGroupRatio(ratio: GroupRatio): void {
  for (const group_type of group_types) {
    const value = ratio[group_type];
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(
        `Invalid ${group_type} ratio: ${value}; Expected a non-negative number`
      );
    }
  }
  const total = ratio.train + ratio.val + ratio.test;
  if (Math.abs(total - 1.0) > ratio_tolerance) {
    throw new Error(`Ratios must sum to 1.0, got ${total}`);
  }
}

/** images having a same-stem label file, sorted by image filename */
export async function findSamplePairs(options: {
  images_dir: string;
  labels_dir: string;
}): Promise<SamplePair[]> {
  const { images_dir, labels_dir } = options;
  const pairs: SamplePair[] = [];
  for (const image of await getImageFiles(images_dir)) {
    const label = join(labels_dir, toLabelFilename(image.filename));
    if (existsSync(label)) {
      pairs.push({ image, label });
    }
  }
  return pairs;
}

/**
 * Cut a shuffled list at `floor(train_ratio * N)` and
 * `floor(train_ratio * N) + floor(val_ratio * N)`; the remainder goes to test.
 */
export function partitionByRatio<T>(
  items: T[],
  ratio: GroupRatio
): Record<GroupType, T[]> {
  const total = items.length;
  const train_end = Math.floor(ratio.train * total);
  const val_end = train_end + Math.floor(ratio.val * total);
  return {
    train: items.slice(0, train_end),
    val: items.slice(train_end, val_end),
    test: items.slice(val_end),
  };
}

/** determine which group should receive next sample */
export function dispatchGroup(options: {
  current: GroupCounts;
  target: GroupRatio;
}): GroupType {
  const { current, target } = options;

  // groups with a zero target never receive samples
  const active_groups = group_types.filter((g) => target[g] > 0);
  if (active_groups.length === 0) {
    throw new Error(`Invalid target ratio: expect at least one group above 0`);
  }

  const total_target = active_groups.reduce((sum, g) => sum + target[g], 0);
  const total_current = active_groups.reduce((sum, g) => sum + current[g], 0);

  let best_group: GroupType = active_groups[0];
  let best_error = Infinity;

  for (const group_type of active_groups) {
    if (current[group_type] === 0) {
      best_group = group_type;
      break;
    }

    const simulated = { ...current };
    simulated[group_type] += 1;
    const new_total = total_current + 1;

    let error = 0;
    for (const grp_type of active_groups) {
      const actual_ratio = simulated[grp_type] / new_total;
      const target_ratio = target[grp_type] / total_target;
      const diff = actual_ratio - target_ratio;
      error += diff * diff;
    }

    if (error < best_error) {
      best_error = error;
      best_group = group_type;
    }
  }

  return best_group;
}

/** key used for label files without any box */
export const background_class_key = -1;

/**
 * most frequent class index in a label file, ties go to the lower index,
 * malformed lines are skipped
 */
export async function readDominantClass(label_path: string): Promise<number> {
  const content = await readFile(label_path, "utf-8");
  const counts = new Map<number, number>();
  for (const line of extract_lines(content)) {
    if (!line.trim()) continue;
    let class_idx: number;
    try {
      class_idx = parseDetectLabelString({ line }).class_idx;
    } catch (error) {
      console.warn(
        `Warning: skip malformed label line in ${label_path}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
      continue;
    }
    counts.set(class_idx, (counts.get(class_idx) ?? 0) + 1);
  }
  let dominant = background_class_key;
  let dominant_count = 0;
  for (const [class_idx, count] of counts) {
    if (
      count > dominant_count ||
      (count === dominant_count && class_idx < dominant)
    ) {
      dominant = class_idx;
      dominant_count = count;
    }
  }
  return dominant;
}

/**
 * Dispatch each sample by its dominant class so every class keeps the target
 * ratio. Samples are visited in the given (shuffled) order.
 */
export async function partitionByClass(
  pairs: SamplePair[],
  ratio: GroupRatio
): Promise<Record<GroupType, SamplePair[]>> {
  const result: Record<GroupType, SamplePair[]> = {
    train: [],
    val: [],
    test: [],
  };
  const current_ratio_by_class = new Map<number, GroupCounts>();

  for (const pair of pairs) {
    const class_key = await readDominantClass(pair.label);
    let current = current_ratio_by_class.get(class_key);
    if (!current) {
      current = { train: 0, val: 0, test: 0 };
      current_ratio_by_class.set(class_key, current);
    }
    const group_type = dispatchGroup({ current, target: ratio });
    current[group_type]++;
    result[group_type].push(pair);
  }

  return result;
}

/** refuse to mix a new split into files left by an earlier run */
export async function assertEmptySplitLayout(output_dir: string) {
  for (const type of ["images", "labels"]) {
    for (const group_type of group_types) {
      const dir = join(output_dir, type, group_type);
      if (!(await isDirectory(dir))) continue;
      if ((await getDirFilenames(dir)).length > 0) {
        throw new Error(`Split directory is not empty: ${dir}`);
      }
    }
  }
}

async function copySamples(options: {
  output_dir: string;
  group_type: GroupType;
  pairs: SamplePair[];
}) {
  const { output_dir, group_type, pairs } = options;
  const images_dest_dir = join(output_dir, "images", group_type);
  const labels_dest_dir = join(output_dir, "labels", group_type);
  for (const { image, label } of pairs) {
    await copyFile(image.path, join(images_dest_dir, image.filename));
    await copyFile(label, join(labels_dest_dir, toLabelFilename(image.filename)));
  }
}

/**
 * Split the converted corpus into train/val/test and copy each image/label
 * pair into `images/<group>` and `labels/<group>` under `output_dir`.
 *
 * The default strategy is a plain seeded shuffle cut by ratio, without any
 * class balancing. `"stratified"` balances by dominant class instead.
 */
export async function splitDataset(
  options: SplitDatasetOptions
): Promise<GroupCounts> {
  const { images_dir, labels_dir, output_dir } = options;
  const strategy = options.strategy ?? "random";
  const ratio: GroupRatio = {
    train: options.train_ratio,
    val: options.val_ratio,
    test: options.test_ratio,
  };

  validateGroupRatio(ratio);
  await assertDirectory(images_dir, "Image");
  await assertDirectory(labels_dir, "Label");
  await assertEmptySplitLayout(output_dir);

  const pairs = await findSamplePairs({ images_dir, labels_dir });
  console.log(`Found ${pairs.length} image-label pairs`);

  const rng = createRng(normalizeSeed(options.seed));
  const shuffled = shuffle(pairs, rng);
  const groups =
    strategy === "stratified"
      ? await partitionByClass(shuffled, ratio)
      : partitionByRatio(shuffled, ratio);

  console.log(`Splitting dataset (${strategy}):`);
  for (const group_type of group_types) {
    console.log(
      `  ${group_type}: ${groups[group_type].length} (${(
        ratio[group_type] * 100
      ).toFixed(1)}%)`
    );
  }

  for (const group_type of group_types) {
    await cachedMkdir(join(output_dir, "images", group_type));
    await cachedMkdir(join(output_dir, "labels", group_type));
  }
  for (const group_type of group_types) {
    await copySamples({ output_dir, group_type, pairs: groups[group_type] });
  }

  console.log(`Exported dataset to ${output_dir}`);

  return {
    train: groups.train.length,
    val: groups.val.length,
    test: groups.test.length,
  };
}
