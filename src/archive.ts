import { ZipFile } from "yazl";
import { createWriteStream, existsSync } from "fs";
import { join } from "path";
import { getDirFilenames } from "@beenotung/tslib/fs";
import { isDirectory } from "./fs";
import { group_types } from "./group";

/**
 * @example
 * ```ts
 * let archive = new Archive()
 *
 * // subsequence files will be streamed to the zip file
 * let promise = archive.pipeToFile('dataset.zip')
 *
 * // add file to zip by local file path
 * archive.addFile({ src_file: 'dataset/data.yaml', zip_file: 'data.yaml' })
 *
 * // add file to zip by content in string or buffer
 * archive.addFile({ content: 'nc: 10\n', zip_file: 'notes/nc.txt' })
 *
 * // signal the end of the archive stream
 * archive.end()
 *
 * // wait until the compression is completed
 * await promise
 * ```
 */
export class Archive {
  zipFile = new ZipFile();

  /** number of entries added so far */
  count = 0;

  /**
   * @description
   * - Stream the content to a zip file.
   * - Can be called before or after adding files.
   * - Existing zip file will be overwritten if exists.
   *
   * @param file e.g. `"dataset.zip"`
   */
  pipeToFile(file: string) {
    return new Promise<void>((resolve, reject) => {
      this.zipFile.outputStream
        .pipe(createWriteStream(file))
        .on("close", resolve)
        .on("error", reject);
    });
  }

  addFile(args: { src_file: string; zip_file: string }): void;
  addFile(args: { content: string | Buffer; zip_file: string }): void;
  addFile(
    args:
      | { src_file: string; zip_file: string }
      | { content: string | Buffer; zip_file: string }
  ): void {
    if ("src_file" in args) {
      this.zipFile.addFile(args.src_file, args.zip_file, {});
    } else {
      let content = args.content;
      if (typeof content == "string") {
        content = Buffer.from(content);
      }
      this.zipFile.addBuffer(content, args.zip_file);
    }
    this.count++;
  }

  /**
   * @description
   * - Signal the end of the archive stream.
   * - Without calling this, the promise returned by `pipeToFile` will never be resolved.
   */
  end() {
    this.zipFile.end();
  }
}

/**
 * Pack `data.yaml` and the `images/<group>` and `labels/<group>` directories
 * of a split dataset into one zip, keeping relative paths.
 *
 * @returns number of files added
 */
export async function archiveDataset(options: {
  dataset_dir: string;
  zip_file: string;
  yaml_filename?: string;
}): Promise<number> {
  const { dataset_dir, zip_file } = options;
  const yaml_filename = options.yaml_filename ?? "data.yaml";

  if (!(await isDirectory(dataset_dir))) {
    throw new Error(`Dataset directory does not exist: ${dataset_dir}`);
  }

  const entries: Array<{ src_file: string; zip_file: string }> = [];

  const yaml_path = join(dataset_dir, yaml_filename);
  if (existsSync(yaml_path)) {
    entries.push({ src_file: yaml_path, zip_file: yaml_filename });
  }

  for (const type of ["images", "labels"]) {
    for (const group_type of group_types) {
      const dir = join(dataset_dir, type, group_type);
      if (!(await isDirectory(dir))) continue;
      const filenames = (await getDirFilenames(dir)).sort();
      for (const filename of filenames) {
        entries.push({
          src_file: join(dir, filename),
          zip_file: `${type}/${group_type}/${filename}`,
        });
      }
    }
  }

  const archive = new Archive();
  const promise = archive.pipeToFile(zip_file);
  for (const entry of entries) {
    archive.addFile(entry);
  }
  archive.end();
  await promise;

  console.log(`Archived ${archive.count} files to ${zip_file}`);
  return archive.count;
}
