import type { Command } from 'commander';
import { createCollaborators } from '../../collaborators/index.js';
import { ReleaseOrchestrator } from '../../pipeline/orchestrator.js';
import { renderRun } from '../../pipeline/reporter.js';
import type { TriggerContext } from '../../pipeline/types.js';
import { requireWorkspace } from '../cli-shared.js';

interface CiOptions {
  ref: string;
  commit: string;
  changeRequest?: string;
  cd: boolean;
}

export function registerCiCommand(program: Command): void {
  program
    .command('ci')
    .description('Run the CI pipeline for a ref, then CD when it passes')
    .requiredOption('--ref <name>', 'Ref name, e.g. main or 12/merge')
    .requiredOption('--commit <sha>', 'Commit id being built')
    .option('--change-request <number>', 'Pull request to report on')
    .option('--no-cd', 'Do not start the deployment pipeline afterwards')
    .action(async (opts: CiOptions) => {
      const { config } = requireWorkspace();
      const effective = opts.cd ? config : { ...config, cd: { ...config.cd, enabled: false } };

      const changeRequest = opts.changeRequest === undefined ? undefined : Number.parseInt(opts.changeRequest, 10);
      if (changeRequest !== undefined && (Number.isNaN(changeRequest) || changeRequest <= 0)) {
        console.error(`Invalid change request number: ${opts.changeRequest ?? ''}`);
        process.exit(1);
      }

      const orchestrator = new ReleaseOrchestrator({
        config: effective,
        collaborators: createCollaborators(effective),
        cwd: process.cwd(),
      });
      const trigger: TriggerContext = {
        repository: { owner: config.project.owner, name: config.project.repository },
        ref_name: opts.ref,
        commit_id: opts.commit,
        event: 'manual',
        ...(changeRequest !== undefined ? { change_request: changeRequest } : {}),
      };

      const run = await orchestrator.startCi(trigger);
      await orchestrator.idle();

      const runs = [run, ...orchestrator.runs.downstreamOf(run.run_id)];
      for (const r of runs) {
        console.log(renderRun(r));
        console.log();
      }
      if (runs.some((r) => r.status !== 'success')) process.exit(1);
    });
}
