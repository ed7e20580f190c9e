export type { ShiplineConfig, ShiplineConfigInput } from '../shared/schemas.js';

export interface ShiplinePaths {
  root: string;         // .shipline/
  config: string;       // .shipline/config.yaml
  worktrees: string;    // .shipline/worktrees/<run id>
}
