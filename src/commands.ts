import yargs from "yargs";
import { archiveDataset } from "./archive";
import { loadClassMap } from "./class-map";
import { convertDataset } from "./convert";
import { splitDataset, SplitStrategy } from "./split";
import { writeDataYaml } from "./yaml";

const split_strategies: SplitStrategy[] = ["random", "stratified"];

function isSplitStrategy(value: unknown): value is SplitStrategy {
  return value === "random" || value === "stratified";
}

export function createParser(argv: string[]) {
  return yargs(argv)
    .scriptName("geo-yolo-dataset")
    .command(
      "convert",
      "Convert GeoJSON annotations into one YOLO label file per image",
      (y) =>
        y
          .option("geojson", {
            type: "string",
            demandOption: true,
            desc: "GeoJSON annotation file",
          })
          .option("images", {
            type: "string",
            demandOption: true,
            desc: "Directory containing the images",
          })
          .option("output", {
            type: "string",
            default: "dataset/labels",
            desc: "Output directory for the label files",
          })
          .option("classes-config", {
            type: "string",
            default: "config/classes.yaml",
            desc: "Class config YAML, default classes are used when missing",
          })
          .option("use-simplified", {
            type: "boolean",
            default: true,
            desc: "Read simplified_classes instead of classes",
          }),
      async (argv) => {
        await convertDataset({
          annotations: argv.geojson,
          images_dir: argv.images,
          output_dir: argv.output,
          class_config: {
            config_path: argv["classes-config"],
            use_simplified: argv["use-simplified"],
          },
        });
      }
    )
    .command(
      "split",
      "Split images and labels into train/val/test",
      (y) =>
        y
          .option("images", {
            type: "string",
            demandOption: true,
            desc: "Directory containing all images",
          })
          .option("labels", {
            type: "string",
            demandOption: true,
            desc: "Directory containing all labels",
          })
          .option("output", {
            type: "string",
            default: "dataset",
            desc: "Output directory for the split dataset",
          })
          .option("train-ratio", { type: "number", default: 0.8 })
          .option("val-ratio", { type: "number", default: 0.15 })
          .option("test-ratio", { type: "number", default: 0.05 })
          .option("seed", { type: "number", default: 42 })
          .option("strategy", {
            type: "string",
            choices: split_strategies,
            default: "random",
            desc: "stratified balances partitions by dominant class",
          }),
      async (argv) => {
        if (!isSplitStrategy(argv.strategy)) {
          throw new Error(`Unknown split strategy: ${argv.strategy}`);
        }
        await splitDataset({
          images_dir: argv.images,
          labels_dir: argv.labels,
          output_dir: argv.output,
          train_ratio: argv["train-ratio"],
          val_ratio: argv["val-ratio"],
          test_ratio: argv["test-ratio"],
          seed: argv.seed,
          strategy: argv.strategy,
        });
      }
    )
    .command(
      "data-yaml",
      "Write data.yaml for a split dataset",
      (y) =>
        y
          .option("dataset", {
            type: "string",
            default: "dataset",
            desc: "Dataset directory with images/{train,val,test}",
          })
          .option("classes-config", {
            type: "string",
            default: "config/classes.yaml",
          })
          .option("use-simplified", { type: "boolean", default: true }),
      async (argv) => {
        const class_map = await loadClassMap({
          config_path: argv["classes-config"],
          use_simplified: argv["use-simplified"],
        });
        await writeDataYaml({
          dataset_dir: argv.dataset,
          class_names: class_map.class_names,
        });
      }
    )
    .command(
      "archive",
      "Pack a split dataset into a zip file",
      (y) =>
        y
          .option("dataset", {
            type: "string",
            default: "dataset",
            desc: "Dataset directory with images/ and labels/",
          })
          .option("output", {
            type: "string",
            demandOption: true,
            desc: "Zip file to write",
          }),
      async (argv) => {
        await archiveDataset({
          dataset_dir: argv.dataset,
          zip_file: argv.output,
        });
      }
    )
    .demandCommand(1)
    .strict()
    .fail((message, error, y) => {
      if (error) throw error;
      y.showHelp();
      throw new Error(message);
    })
    .help();
}
