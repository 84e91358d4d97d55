import { join, resolve } from "path";
import { cachedMkdir, saveYAMLFile } from "./fs";

function toString(data: unknown): string {
  return Array.isArray(data)
    ? "[" + data.map(toString).join(", ") + "]"
    : JSON.stringify(data);
}

function removeComment(line: string) {
  return line.split("#")[0];
}

function replaceStringQuote(line: string) {
  return line.replaceAll("'", '"');
}

function isDigit(char: string) {
  return "0" <= char && char <= "9";
}

function isIndented(line: string) {
  return line.startsWith(" ") || line.startsWith("\t");
}

function findKeyIndex(lines: string[], name: string) {
  let pattern = name.toLowerCase() + ":";
  return lines.findIndex((line) => line.toLowerCase().startsWith(pattern));
}

export function hasValue(lines: string[], name: string) {
  return findKeyIndex(lines, name) != -1;
}

function parseValue(value: string): unknown {
  value = removeComment(value);
  value = value.trim();
  // inline array
  if (value.startsWith("[")) {
    return JSON.parse(replaceStringQuote(value));
  }
  // string with single quote, '' is an escaped quote
  if (/^'.*'$/.test(value)) {
    return value.slice(1, -1).replaceAll("''", "'");
  }
  // string with double quote
  if (value.startsWith('"')) {
    return JSON.parse(value);
  }
  // number
  if (isDigit(value[0]) && !Number.isNaN(+value)) {
    return +value;
  }
  // string
  return value;
}

/**
 * Parse an indented block of `key: value` lines under a top-level key, e.g.
 *
 * ```yaml
 * simplified_classes:
 *   11: Fixed-Wing Aircraft
 *   12: Small Vehicle
 * ```
 *
 * Blank and comment-only lines are skipped, the block ends at the next
 * unindented line.
 */
export function findMapping(
  lines: string[],
  name: string
): Array<[key: string, value: unknown]> {
  let index = findKeyIndex(lines, name);
  if (index == -1) {
    throw new Error(`expect ${name} to be a mapping, but it is missing`);
  }
  let rest = removeComment(lines[index].slice(name.length + 1)).trim();
  if (rest) {
    throw new TypeError(
      `expect ${name} to be a multiline mapping, but got inline value: ${rest}`
    );
  }

  let entries: Array<[string, unknown]> = [];
  for (let i = index + 1; i < lines.length; i++) {
    let raw_line = lines[i];
    let line = removeComment(raw_line).trim();
    if (!line) continue;
    if (!isIndented(raw_line)) break;

    let separator = line.indexOf(":");
    if (separator == -1) {
      throw new TypeError(`expect "key: value" in ${name}, but got: ${line}`);
    }
    let key = line.slice(0, separator).trim();
    let value = parseValue(raw_line.slice(raw_line.indexOf(":") + 1));
    entries.push([key, value]);
  }
  return entries;
}

class YamlBuilder {
  lines: string[] = [];

  addLine(line: string) {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.join("\n").trim() + "\n";
  }
}

export type DetectYamlOptions = {
  /** dataset root, written as an absolute path */
  dataset_path?: string;
  train_path?: string;
  val_path?: string;
  test_path?: string;
  n_class: number;
  class_names?: string[];
};

function needsQuote(name: string) {
  return /^[\s\-?:,\[\]{}#&*!|>'"%@`]|:\s|\s#|:$|\s$/.test(name) || name === "";
}

function toScalarString(name: string) {
  return needsQuote(name) ? JSON.stringify(name) : name;
}

export function toDetectDataYamlString(options: DetectYamlOptions): string {
  let yaml = new YamlBuilder();
  if (options.dataset_path) {
    yaml.addLine(`path: ${toScalarString(options.dataset_path)}`);
  }
  if (options.train_path) {
    yaml.addLine(`train: ${options.train_path}`);
  }
  if (options.val_path) {
    yaml.addLine(`val: ${options.val_path}`);
  }
  if (options.test_path) {
    yaml.addLine(`test: ${options.test_path}`);
  }
  yaml.addLine(``);
  yaml.addLine(`nc: ${options.n_class} # Number of classes`);

  if (options.class_names) {
    let class_names = options.class_names;

    if (class_names.length !== options.n_class) {
      throw new Error(
        `Number of class_names (${class_names.length}) does not match n_class (${options.n_class})`
      );
    }

    yaml.addLine("# Class names");
    if (class_names.length > 1) {
      yaml.addLine(`names:`);
      for (let i = 0; i < class_names.length; i++) {
        yaml.addLine(`  ${i}: ${toScalarString(class_names[i])}`);
      }
    } else {
      yaml.addLine(`names: ${toString(class_names)}`);
    }
  }

  yaml.addLine(``);

  return yaml.toString();
}

/** write `data.yaml` for the `images/{train,val,test}` layout */
export async function writeDataYaml(options: {
  dataset_dir: string;
  class_names: string[];
  yaml_filename?: string;
}): Promise<"saved" | "no change"> {
  const { dataset_dir, class_names } = options;
  const yaml_filename = options.yaml_filename ?? "data.yaml";

  const content = toDetectDataYamlString({
    dataset_path: resolve(dataset_dir),
    train_path: "images/train",
    val_path: "images/val",
    test_path: "images/test",
    n_class: class_names.length,
    class_names,
  });

  await cachedMkdir(dataset_dir);
  const yaml_path = join(dataset_dir, yaml_filename);
  const result = await saveYAMLFile(yaml_path, content);
  console.log(`${result === "saved" ? "Created" : "Unchanged"}: ${yaml_path}`);
  return result;
}
