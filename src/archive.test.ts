import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Archive, archiveDataset } from "./archive";

describe("archive", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), "geo-yolo-archive-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("streams added content into a zip file", async () => {
    const zip_file = join(dir, "notes.zip");
    const archive = new Archive();
    const promise = archive.pipeToFile(zip_file);
    archive.addFile({ content: "nc: 10\n", zip_file: "notes/nc.txt" });
    archive.addFile({ content: Buffer.from("ok"), zip_file: "ok.txt" });
    archive.end();
    await promise;

    expect(archive.count).toBe(2);
    const buffer = await readFile(zip_file);
    expect(buffer.subarray(0, 2).toString()).toBe("PK");
    expect(buffer.includes("notes/nc.txt")).toBe(true);
  });

  it("packs data.yaml with the split directories", async () => {
    const dataset_dir = join(dir, "dataset");
    await mkdir(join(dataset_dir, "images/train"), { recursive: true });
    await mkdir(join(dataset_dir, "labels/train"), { recursive: true });
    await mkdir(join(dataset_dir, "images/val"), { recursive: true });
    await mkdir(join(dataset_dir, "labels/val"), { recursive: true });
    await writeFile(join(dataset_dir, "data.yaml"), "nc: 1\n");
    await writeFile(join(dataset_dir, "images/train/a.jpg"), "a");
    await writeFile(join(dataset_dir, "labels/train/a.txt"), "");
    await writeFile(join(dataset_dir, "images/val/b.jpg"), "b");
    await writeFile(join(dataset_dir, "labels/val/b.txt"), "");
    await writeFile(join(dataset_dir, "stray.txt"), "not packed");

    const zip_file = join(dir, "dataset.zip");
    expect(await archiveDataset({ dataset_dir, zip_file })).toBe(5);

    const buffer = await readFile(zip_file);
    expect(buffer.includes("data.yaml")).toBe(true);
    expect(buffer.includes("images/train/a.jpg")).toBe(true);
    expect(buffer.includes("labels/val/b.txt")).toBe(true);
    expect(buffer.includes("stray.txt")).toBe(false);
  });

  it("rejects a missing dataset directory", async () => {
    const dataset_dir = join(dir, "none");
    await expect(
      archiveDataset({ dataset_dir, zip_file: join(dir, "x.zip") })
    ).rejects.toThrow(`Dataset directory does not exist: ${dataset_dir}`);
  });
});
