import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { findMapping, hasValue } from "./yaml";

/** raw taxonomy id -> display name */
export type ClassDict = Map<number, string>;

export type ClassMap = {
  /** raw taxonomy id -> dense class index */
  index_by_id: Map<number, number>;
  /** display name of each class index */
  class_names: string[];
};

export const default_class_dict: ClassDict = new Map([
  [11, "Fixed-Wing Aircraft"],
  [12, "Small Vehicle"],
  [13, "Large Vehicle"],
  [15, "Truck"],
  [21, "Passenger Vehicle"],
  [37, "Ship"],
  [52, "Building"],
  [57, "Helipad"],
  [58, "Storage Tank"],
  [59, "Shipping Container"],
]);

/**
 * Assign class indices 0..n-1 in ascending raw id order.
 * The order does not depend on how often a class is annotated.
 */
export function buildClassMap(class_dict: ClassDict): ClassMap {
  const ids = Array.from(class_dict.keys()).sort((a, b) => a - b);
  const index_by_id = new Map<number, number>();
  const class_names: string[] = [];
  ids.forEach((id, index) => {
    index_by_id.set(id, index);
    class_names.push(class_dict.get(id) ?? String(id));
  });
  return { index_by_id, class_names };
}

export function parseClassConfigYaml(
  yaml: string,
  mapping_key: string
): ClassDict {
  const lines = yaml.split(/\r?\n/);
  if (!hasValue(lines, mapping_key)) {
    throw new Error(`Missing "${mapping_key}" section in class config`);
  }
  const class_dict: ClassDict = new Map();
  for (const [key, value] of findMapping(lines, mapping_key)) {
    const id = +key;
    if (!key || !Number.isInteger(id)) {
      throw new TypeError(
        `expect integer class id in "${mapping_key}", but got: ${key}`
      );
    }
    class_dict.set(id, String(value));
  }
  return class_dict;
}

export type ClassConfigOptions = {
  /** e.g. `"config/classes.yaml"` */
  config_path?: string;
  /** read `simplified_classes` instead of `classes`, default `true` */
  use_simplified?: boolean;
};

export async function loadClassMap(
  options: ClassConfigOptions = {}
): Promise<ClassMap> {
  const { config_path, use_simplified = true } = options;

  if (!config_path) {
    return buildClassMap(default_class_dict);
  }
  if (!existsSync(config_path)) {
    console.warn(
      `Warning: class config not found: ${config_path}, using default classes`
    );
    return buildClassMap(default_class_dict);
  }

  const mapping_key = use_simplified ? "simplified_classes" : "classes";
  const content = await readFile(config_path, "utf-8");
  try {
    return buildClassMap(parseClassConfigYaml(content, mapping_key));
  } catch (error) {
    throw new Error(
      `Invalid class config ${config_path}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
  }
}
