import type { Command } from 'commander';
import { createCollaborators } from '../../collaborators/index.js';
import { ReleaseOrchestrator } from '../../pipeline/orchestrator.js';
import { renderDeploymentCheck } from '../../pipeline/reporter.js';
import { requireWorkspace } from '../cli-shared.js';

export function registerVerifyCommand(program: Command): void {
  program
    .command('verify')
    .description('Pull the published image for a ref and check it computes 2 + 3')
    .requiredOption('--ref <name>', 'Ref name whose image to pull')
    .requiredOption('--commit <sha>', 'Commit id, used when the ref tag cannot be pulled')
    .action(async (opts: { ref: string; commit: string }) => {
      const { config } = requireWorkspace();
      const orchestrator = new ReleaseOrchestrator({ config, collaborators: createCollaborators(config) });
      const check = await orchestrator.verify(opts.ref, opts.commit);
      console.log(renderDeploymentCheck(check));
      if (!check.pass) process.exit(1);
    });
}
