import 'reflect-metadata';
import 'dotenv/config';
import { plainToInstance, Transform, type TransformFnParams } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Min,
  validateSync,
} from 'class-validator';
import { parseRepoRef, type RepoRef } from '../raw/github-client-interface.js';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

export const DEFAULT_MONTHS_BACK = 6;
export const DEFAULT_OUTPUT_DIR = 'output';

const TRUTHY = ['true', 'yes', '1'];

/** Empty or whitespace-only values count as unset */
const blankAsUnset = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const toNumberOrUnset = (params: TransformFnParams): unknown => {
  const value = blankAsUnset(params);
  return value === undefined ? undefined : Number(value);
};

export class EnvironmentVariables {
  @Transform(blankAsUnset)
  @IsOptional()
  @Matches(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, {
    message: "GITHUB_REPO must be in the format 'owner/repo_name'",
  })
  GITHUB_REPO?: string;

  @Transform(blankAsUnset)
  @IsOptional()
  @IsString()
  GITHUB_TOKEN?: string;

  @Transform(toNumberOrUnset)
  @IsOptional()
  @IsInt({ message: 'MONTHS must be a whole number of months' })
  @Min(1, { message: 'MONTHS must be at least 1' })
  MONTHS?: number;

  @IsString({ message: 'DATABASE_URL is required' })
  @IsNotEmpty({ message: 'DATABASE_URL is required' })
  DATABASE_URL!: string;

  @Transform(blankAsUnset)
  @IsOptional()
  @IsString()
  OUTPUT_DIR?: string;

  @Transform(blankAsUnset)
  @IsOptional()
  @Matches(/^(true|yes|1|false|no|0)$/i, {
    message: 'RUN_ANALYSIS must be one of true, yes, 1, false, no, 0',
  })
  RUN_ANALYSIS?: string;
}

export interface PipelineConfig {
  /** Default repository for runs that do not name one */
  repo: RepoRef | null;
  monthsBack: number;
  accessToken: string | null;
  /** PostgreSQL connection string */
  storeTarget: string;
  outputDir: string;
  runAnalysis: boolean;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const vars = plainToInstance(EnvironmentVariables, { ...env });
  const errors = validateSync(vars);
  if (errors.length > 0) {
    throw new ConfigError(errors.flatMap((e) => Object.values(e.constraints ?? {})));
  }

  const token = vars.GITHUB_TOKEN?.trim();
  return {
    repo: vars.GITHUB_REPO ? parseRepoRef(vars.GITHUB_REPO) : null,
    monthsBack: vars.MONTHS ?? DEFAULT_MONTHS_BACK,
    accessToken: token ? token : null,
    storeTarget: vars.DATABASE_URL,
    outputDir: vars.OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR,
    runAnalysis: vars.RUN_ANALYSIS ? TRUTHY.includes(vars.RUN_ANALYSIS.toLowerCase()) : true,
  };
}

/** Loggable view of the config with secrets masked */
export function describeConfig(config: PipelineConfig): Record<string, unknown> {
  return {
    repo: config.repo ? `${config.repo.owner}/${config.repo.name}` : null,
    monthsBack: config.monthsBack,
    accessToken: config.accessToken ? '****' : null,
    storeTarget: config.storeTarget.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:****@'),
    outputDir: config.outputDir,
    runAnalysis: config.runAnalysis,
  };
}
