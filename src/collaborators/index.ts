import { GitHubChangeRequests } from '../connector/github/change-requests.js';
import { resolveGitHubToken } from '../workspace/config.js';
import { getShiplinePaths } from '../workspace/paths.js';
import type { ShiplineConfig } from '../workspace/types.js';
import { DockerCli } from './docker.js';
import { GitWorktrees } from './git.js';
import { ShellCommandRunner } from './process.js';
import { TrivyScanner } from './trivy.js';
import type { Collaborators } from './types.js';

/**
 * Production collaborators: docker, trivy, local shell commands, git worktrees
 * under `.shipline/worktrees` and the GitHub API.
 */
export function createCollaborators(
  config: ShiplineConfig,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Collaborators {
  const docker = new DockerCli();
  const commands = new ShellCommandRunner();
  return {
    commands,
    registry: docker,
    sandbox: docker,
    scanner: new TrivyScanner(),
    changeRequests: new GitHubChangeRequests({
      token: resolveGitHubToken(config, env),
      apiUrl: config.github.api_url,
    }),
    source: new GitWorktrees({ commands, repoDir: cwd, root: getShiplinePaths(cwd).worktrees }),
  };
}
