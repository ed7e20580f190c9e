import type { ReleaseOrchestrator } from '../pipeline/orchestrator.js';
import type { ShiplineConfig } from '../workspace/types.js';

export interface RouteOpts {
  orchestrator: ReleaseOrchestrator;
  config: ShiplineConfig;
  /** HMAC secret for webhook signatures; null disables verification. */
  webhookSecret: string | null;
  /** Workspace directory for doctor checks; defaults to the process cwd. */
  cwd?: string;
}

export function parseLimit(value: string | undefined, fallback: number, max: number): number {
  const n = Number.parseInt(value ?? '', 10);
  if (Number.isNaN(n) || n < 0) return fallback;
  return Math.min(n, max);
}
