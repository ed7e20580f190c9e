import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { ShiplineConfigSchema } from '../shared/schemas.js';
import type { ImageCoordinates } from '../pipeline/types.js';
import type { ShiplineConfig, ShiplineConfigInput } from './types.js';

export function parseShiplineConfig(raw: unknown, source = '<inline>'): ShiplineConfig {
  const parsed = ShiplineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigError(source, `Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function readShiplineConfig(configPath: string): ShiplineConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(configPath, 'Workspace not initialized. Run `shipline init` first.');
  }
  let raw: unknown;
  try {
    raw = load(readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(configPath, `Config is not valid YAML: ${errorMessage(err)}`);
  }
  return parseShiplineConfig(raw, configPath);
}

export function writeShiplineConfig(configPath: string, config: ShiplineConfigInput): void {
  writeFileSync(configPath, dump(config), 'utf8');
}

export function imageCoordinates(config: ShiplineConfig): ImageCoordinates {
  return {
    registry: config.image.registry,
    namespace: config.image.namespace ?? config.project.owner,
    repository: config.image.repository ?? config.project.repository,
  };
}

export function resolveGitHubToken(config: ShiplineConfig, env: NodeJS.ProcessEnv = process.env): string | null {
  return env[config.github.token_env] ?? null;
}

export function resolveWebhookSecret(config: ShiplineConfig, env: NodeJS.ProcessEnv = process.env): string | null {
  return env[config.server.webhook_secret_env] ?? null;
}
