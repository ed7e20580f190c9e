import { z } from 'zod';

const Command = z.array(z.string().min(1)).min(1);
const Timeout = z.number().int().positive().optional();
const Policy = z.enum(['blocking', 'advisory']);
export const SeveritySchema = z.enum(['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']);

export const ShiplineConfigSchema = z.object({
  project: z.object({
    owner: z.string().min(1),
    repository: z.string().min(1),
  }),
  image: z
    .object({
      registry: z.string().min(1).default('ghcr.io'),
      /** Defaults to project.owner. */
      namespace: z.string().optional(),
      /** Defaults to project.repository. */
      repository: z.string().optional(),
    })
    .default({}),
  ci: z.object({
    test: z.object({
      command: Command,
      variants: z.array(z.string().min(1)).default([]),
      timeout_ms: Timeout,
    }),
    lint: z
      .object({
        command: Command,
        policy: Policy.default('blocking'),
        timeout_ms: Timeout,
      })
      .optional(),
    coverage: z.object({
      command: Command,
      threshold: z.number().min(0).max(100).default(80),
      timeout_ms: Timeout,
    }),
    build: z
      .object({
        context: z.string().min(1).default('.'),
        dockerfile: z.string().min(1).default('Dockerfile'),
        timeout_ms: Timeout,
      })
      .default({}),
    scan: z
      .object({
        fail_on: SeveritySchema.default('HIGH'),
        ignore_unfixed: z.boolean().default(true),
        policy: Policy.default('blocking'),
        timeout_ms: Timeout,
      })
      .default({}),
  }),
  cd: z
    .object({
      enabled: z.boolean().default(true),
      timeout_ms: Timeout,
    })
    .default({}),
  execution: z
    .object({
      concurrency: z.number().int().min(1).default(4),
      default_timeout_ms: z.number().int().positive().default(600_000),
    })
    .default({}),
  github: z
    .object({
      api_url: z.string().url().default('https://api.github.com'),
      token_env: z.string().min(1).default('GITHUB_TOKEN'),
    })
    .default({}),
  server: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(7800),
      /** Base URL used for run links in reports. */
      public_url: z.string().url().optional(),
      webhook_secret_env: z.string().min(1).default('SHIPLINE_WEBHOOK_SECRET'),
    })
    .default({}),
});

export type ShiplineConfig = z.infer<typeof ShiplineConfigSchema>;
export type ShiplineConfigInput = z.input<typeof ShiplineConfigSchema>;

const Repository = z.object({
  full_name: z.string(),
  name: z.string(),
  owner: z.object({ login: z.string().optional(), name: z.string().optional() }),
});

export const PushEventSchema = z.object({
  ref: z.string(),
  after: z.string(),
  deleted: z.boolean().default(false),
  repository: Repository,
});

export const PullRequestEventSchema = z.object({
  action: z.string(),
  number: z.number().int(),
  pull_request: z.object({
    head: z.object({ sha: z.string() }),
  }),
  repository: Repository,
});
