import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  validateSync,
} from 'class-validator';
import { ConfigurationError } from './configuration.error.js';

export const ANALYZER_CONFIG = Symbol('ANALYZER_CONFIG');

/** Sort key of the "Active Repositories" report section. */
export type ActiveRepoSort = 'name' | 'updated';

export const ACTIVE_REPO_SORTS: readonly ActiveRepoSort[] = ['name', 'updated'];

export const DEFAULT_OUTPUT_DIR = 'reports';

export interface AnalyzerConfig {
  token: string;
  organization: string;
  outputDir: string;
  activeRepoSort: ActiveRepoSort;
  apiUrl?: string;
}

export class AnalyzerEnvironment {
  @IsString()
  @IsNotEmpty()
  GITHUB_TOKEN!: string;

  @IsString()
  @IsNotEmpty()
  GITHUB_ORG!: string;

  @IsOptional()
  @IsString()
  OUTPUT_DIR?: string;

  @IsOptional()
  @IsIn(ACTIVE_REPO_SORTS)
  ACTIVE_REPO_SORT?: ActiveRepoSort;

  // require_tld off so GitHub Enterprise hosts on internal names pass
  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  GITHUB_API_URL?: string;
}

// An empty variable (`ACTIVE_REPO_SORT=`) counts as unset.
const present = (value: string | undefined) => (value === '' ? undefined : value);

/**
 * Reads and validates the analyzer settings, then makes sure the output
 * directory exists. Throws {@link ConfigurationError} before anything talks to
 * the network.
 */
export function loadAnalyzerConfig(
  env: NodeJS.ProcessEnv = process.env,
): AnalyzerConfig {
  const parsed = plainToInstance(AnalyzerEnvironment, {
    GITHUB_TOKEN: present(env.GITHUB_TOKEN),
    GITHUB_ORG: present(env.GITHUB_ORG),
    OUTPUT_DIR: present(env.OUTPUT_DIR),
    ACTIVE_REPO_SORT: present(env.ACTIVE_REPO_SORT),
    GITHUB_API_URL: present(env.GITHUB_API_URL),
  });

  const errors = validateSync(parsed);
  if (errors.length > 0) {
    const variables = errors.map((e) => e.property);
    throw new ConfigurationError(
      `Missing or invalid environment variables: ${variables.join(', ')}`,
      variables,
    );
  }

  const outputDir = resolve(parsed.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR);
  mkdirSync(outputDir, { recursive: true });

  return {
    token: parsed.GITHUB_TOKEN,
    organization: parsed.GITHUB_ORG,
    outputDir,
    activeRepoSort: parsed.ACTIVE_REPO_SORT ?? 'name',
    apiUrl: parsed.GITHUB_API_URL,
  };
}
