import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { findMapping, toDetectDataYamlString, writeDataYaml } from "./yaml";

describe("toDetectDataYamlString", () => {
  it("lists paths, class count and class names", () => {
    expect(
      toDetectDataYamlString({
        dataset_path: "/data/xview",
        train_path: "images/train",
        val_path: "images/val",
        test_path: "images/test",
        n_class: 2,
        class_names: ["Small Vehicle", "Ship: large"],
      })
    ).toBe(
      [
        "path: /data/xview",
        "train: images/train",
        "val: images/val",
        "test: images/test",
        "",
        "nc: 2 # Number of classes",
        "# Class names",
        "names:",
        "  0: Small Vehicle",
        '  1: "Ship: large"',
        "",
      ].join("\n")
    );
  });

  it("quotes a dataset path that would break the yaml", () => {
    expect(
      toDetectDataYamlString({
        dataset_path: "/data/run #2/set: a",
        n_class: 1,
        class_names: ["Ship"],
      }).split("\n")[0]
    ).toBe('path: "/data/run #2/set: a"');
  });

  it("writes a single class inline", () => {
    expect(
      toDetectDataYamlString({ n_class: 1, class_names: ["Ship"] })
    ).toBe('nc: 1 # Number of classes\n# Class names\nnames: ["Ship"]\n');
  });

  it("rejects mismatched class names", () => {
    expect(() =>
      toDetectDataYamlString({ n_class: 3, class_names: ["Ship"] })
    ).toThrow("Number of class_names (1) does not match n_class (3)");
  });
});

describe("findMapping", () => {
  it("reads the indented entries of a key", () => {
    const lines = ["names:", "  0: Ship # boat", "", "  1: 'Truck'", "nc: 2"];
    expect(findMapping(lines, "names")).toEqual([
      ["0", "Ship"],
      ["1", "Truck"],
    ]);
  });

  it("rejects an inline value", () => {
    expect(() => findMapping(["names: [a, b]"], "names")).toThrow(
      "expect names to be a multiline mapping, but got inline value: [a, b]"
    );
  });
});

describe("writeDataYaml", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), "geo-yolo-yaml-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("saves data.yaml only when changed", async () => {
    const options = { dataset_dir: dir, class_names: ["Truck", "Ship"] };

    expect(await writeDataYaml(options)).toBe("saved");
    expect(await writeDataYaml(options)).toBe("no change");

    const content = await readFile(join(dir, "data.yaml"), "utf-8");
    expect(content.split("\n").slice(0, 4)).toEqual([
      `path: ${dir}`,
      "train: images/train",
      "val: images/val",
      "test: images/test",
    ]);
    expect(content.endsWith("names:\n  0: Truck\n  1: Ship\n")).toBe(true);
    expect(console.log).toHaveBeenLastCalledWith(
      `Unchanged: ${join(dir, "data.yaml")}`
    );
  });
});
