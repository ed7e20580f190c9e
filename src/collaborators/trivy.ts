import { spawn } from 'node:child_process';
import { z } from 'zod';
import { CollaboratorError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Finding, Severity } from '../pipeline/types.js';
import { execProcess } from './process.js';
import type { ScanOptions, ScanReport, Scanner } from './types.js';

const SeveritySchema = z.enum(['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL']).catch('UNKNOWN');

const TrivyReportSchema = z.object({
  ArtifactName: z.string().optional(),
  Results: z
    .array(
      z.object({
        Target: z.string().optional(),
        Vulnerabilities: z
          .array(
            z.object({
              VulnerabilityID: z.string(),
              PkgName: z.string(),
              InstalledVersion: z.string().default(''),
              FixedVersion: z.string().optional(),
              Severity: SeveritySchema,
              Title: z.string().optional(),
            }),
          )
          .nullish(),
      }),
    )
    .nullish(),
});

/** Flatten a trivy JSON report into findings. Throws CollaboratorError on unexpected shape. */
export function parseTrivyReport(raw: string): Finding[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new CollaboratorError('trivy', `invalid JSON output: ${errorMessage(err)}`);
  }
  const parsed = TrivyReportSchema.safeParse(json);
  if (!parsed.success) {
    throw new CollaboratorError('trivy', `unexpected report shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  const findings: Finding[] = [];
  for (const result of parsed.data.Results ?? []) {
    for (const vuln of result.Vulnerabilities ?? []) {
      findings.push({
        id: vuln.VulnerabilityID,
        package: vuln.PkgName,
        installed_version: vuln.InstalledVersion,
        fixed_version: vuln.FixedVersion ?? null,
        severity: vuln.Severity,
        title: vuln.Title ?? '',
      });
    }
  }
  return findings;
}

export interface TrivyScannerOptions {
  trivyBin?: string;
  spawn?: typeof spawn;
}

export class TrivyScanner implements Scanner {
  private readonly bin: string;
  private readonly spawnImpl: typeof spawn;

  constructor(opts: TrivyScannerOptions = {}) {
    this.bin = opts.trivyBin ?? 'trivy';
    this.spawnImpl = opts.spawn ?? spawn;
  }

  async scan(image: string, options: ScanOptions): Promise<ScanReport> {
    const args = buildTrivyArgs(image, options);
    logger.info('Scanning image', { image, mode: options.mode, severities: options.severities.join(',') });

    const result = await execProcess([this.bin, ...args], {
      timeoutMs: options.timeoutMs,
      spawn: this.spawnImpl,
      collaborator: 'trivy',
    });
    if (result.exit_code !== 0) {
      throw new CollaboratorError('trivy', result.stderr.trim() || `exited with code ${result.exit_code}`);
    }
    return { image, findings: parseTrivyReport(result.stdout) };
  }
}

export function buildTrivyArgs(image: string, options: ScanOptions): string[] {
  const timeoutSeconds = Math.max(1, Math.ceil(options.timeoutMs / 1000));
  const args = ['image', '--format', 'json', '--quiet', '--exit-code', '0', '--timeout', `${timeoutSeconds}s`];
  if (options.severities.length > 0) {
    args.push('--severity', options.severities.join(','));
  }
  if (options.ignoreUnfixed) args.push('--ignore-unfixed');
  args.push(image);
  return args;
}

/** Severities at or above `threshold`, lowest first. */
export function severitiesAtOrAbove(threshold: Severity): Severity[] {
  const all: Severity[] = ['UNKNOWN', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];
  return all.slice(all.indexOf(threshold));
}
