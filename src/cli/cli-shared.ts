import { getShiplinePaths } from '../workspace/paths.js';
import { readShiplineConfig } from '../workspace/config.js';
import type { ShiplineConfig, ShiplinePaths } from '../workspace/types.js';
import { errorMessage } from '../shared/errors.js';

export interface WorkspaceContext {
  paths: ShiplinePaths;
  config: ShiplineConfig;
}

/**
 * Load the workspace config, or print the problem and exit.
 * Use at the top of every CLI command that requires an initialized workspace.
 */
export function requireWorkspace(cwd?: string): WorkspaceContext {
  const paths = getShiplinePaths(cwd);
  try {
    return { paths, config: readShiplineConfig(paths.config) };
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
}

