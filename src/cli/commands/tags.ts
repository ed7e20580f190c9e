import { existsSync } from 'node:fs';
import type { Command } from 'commander';
import { imageReference, resolveArtifactTags, deriveTags } from '../../pipeline/tags.js';
import { getShiplinePaths } from '../../workspace/paths.js';
import { imageCoordinates, readShiplineConfig } from '../../workspace/config.js';

export function registerTagsCommand(program: Command): void {
  program
    .command('tags <ref> <commit>')
    .description('Print the image tags a ref and commit publish to')
    .action((ref: string, commit: string) => {
      const paths = getShiplinePaths();
      if (!existsSync(paths.config)) {
        const { mutable, immutable } = deriveTags(ref, commit);
        console.log(`mutable:   ${mutable}`);
        console.log(`immutable: ${immutable}`);
        return;
      }
      const tags = resolveArtifactTags(imageCoordinates(readShiplineConfig(paths.config)), ref, commit);
      console.log(`mutable:   ${imageReference(tags.mutable)}`);
      console.log(`immutable: ${imageReference(tags.immutable)}`);
    });
}
