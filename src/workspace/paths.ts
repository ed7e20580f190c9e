import { join } from 'node:path';
import type { ShiplinePaths } from './types.js';

export function getShiplinePaths(cwd: string = process.cwd()): ShiplinePaths {
  const root = join(cwd, '.shipline');
  return {
    root,
    config: join(root, 'config.yaml'),
    worktrees: join(root, 'worktrees'),
  };
}
