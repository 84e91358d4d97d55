import { existsSync } from "fs";
import { mkdir, readFile, stat, writeFile } from "fs/promises";
import { basename, extname, join } from "path";
import { getDirFilenames } from "@beenotung/tslib/fs";

export const image_extensions = [
  ".jpg",
  ".jpeg",
  ".png",
  ".webp",
  ".tif",
  ".tiff",
];

export function isImageFile(filename: string): boolean {
  return image_extensions.includes(extname(filename).toLowerCase());
}

/** filename without its last extension, e.g. `"104.tif"` -> `"104"` */
export function toStem(filename: string): string {
  return basename(filename, extname(filename));
}

export function toLabelFilename(image_filename: string): string {
  return toStem(image_filename) + ".txt";
}

export type ImageFile = {
  /** e.g. `"104.tif"` */
  filename: string;
  /** e.g. `"104"` */
  stem: string;
  /** e.g. `"dataset/train_images/104.tif"` */
  path: string;
};

/** image files directly inside `dir`, sorted by filename */
export async function getImageFiles(dir: string): Promise<ImageFile[]> {
  const filenames = (await getDirFilenames(dir)).filter(isImageFile).sort();
  return filenames.map((filename) => ({
    filename,
    stem: toStem(filename),
    path: join(dir, filename),
  }));
}

export async function isDirectory(path: string): Promise<boolean> {
  if (!existsSync(path)) return false;
  return (await stat(path)).isDirectory();
}

export async function assertDirectory(path: string, name: string) {
  if (!(await isDirectory(path))) {
    throw new Error(`${name} directory does not exist: ${path}`);
  }
}

export function assertFile(path: string, name: string) {
  if (!existsSync(path)) {
    throw new Error(`${name} file does not exist: ${path}`);
  }
}

export async function saveYAMLFile(
  save_path: string,
  content: string
): Promise<"no change" | "saved"> {
  const newContent = content.trim() + "\n";

  if (existsSync(save_path)) {
    const oldContent = (await readFile(save_path)).toString();
    if (newContent === oldContent) return "no change";
  }

  await writeFile(save_path, newContent);
  return "saved";
}

let created_dirs = new Set<string>();
export async function cachedMkdir(dir: string) {
  if (created_dirs.has(dir) && existsSync(dir)) return;
  await mkdir(dir, { recursive: true });
  created_dirs.add(dir);
}
