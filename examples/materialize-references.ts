/**
 * Resolve every reference path in a configuration and download the fasta
 * files that are missing
 *
 * Usage: examples/materialize-references.ts config/config.yaml
 */

import { exists, loadConfig, lookupPath, materialize, resolvePaths, tagOf } from "../src";

async function main(configPath: string): Promise<void> {
  const config = await loadConfig(configPath);
  const paths = resolvePaths(config);

  for (const block of config.references) {
    if (block.type !== "fasta") continue;

    const tag = tagOf(block);
    const outfile = lookupPath(paths, block.assembly, tag, "fasta");
    if (await exists(outfile)) {
      console.log(`${block.assembly}/${tag}: ${outfile} already present`);
      continue;
    }

    await materialize(outfile, config, block.assembly, tag);
    console.log(`${block.assembly}/${tag}: wrote ${outfile}`);
  }
}

const [configPath] = process.argv.slice(2);
if (configPath === undefined) {
  console.error("Usage: materialize-references.ts <config.yaml>");
  process.exit(1);
}

main(configPath).catch((error: unknown) => {
  console.error(String(error));
  process.exit(1);
});
