import type { Command } from 'commander';
import { errorMessage } from '../../shared/errors.js';
import { initWorkspace } from '../../workspace/init.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a Shipline workspace in the current directory')
    .requiredOption('--owner <owner>', 'Repository owner (user or organisation)')
    .requiredOption('--repo <name>', 'Repository name')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .action((opts: { owner: string; repo: string; force: boolean }) => {
      console.log(`Initializing workspace for ${opts.owner}/${opts.repo}...`);

      try {
        const config = initWorkspace({ owner: opts.owner, repository: opts.repo, force: opts.force });
        console.log(`\nWorkspace initialized!`);
        console.log(`  Project:   ${config.project.owner}/${config.project.repository}`);
        console.log(`  Registry:  ${config.image?.registry ?? 'ghcr.io'}`);
        console.log(`  Variants:  ${(config.ci.test.variants ?? []).join(', ') || '(single run)'}`);
        console.log(`\nNext steps:`);
        console.log(`  shipline doctor   – check docker, trivy and credentials`);
        console.log(`  shipline ci       – run the CI pipeline locally`);
        console.log(`  shipline serve    – accept GitHub webhooks`);
      } catch (err) {
        console.error(`Init failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    });
}
