#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { createParser } from "./commands";

async function main() {
  await createParser(hideBin(process.argv)).parseAsync();
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
