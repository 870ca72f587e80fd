/**
 * CLI 설정
 * .env.local → .env 순으로 환경 변수를 읽고 커맨드 옵션과 합침
 */
import dotenv from 'dotenv';
import path from 'node:path';
import { ENV_KEYS, parseFlag } from '@transit-routes/shared';

export interface CliConfig {
  /** stderr에 그래프 통계와 질의별 소요 시간 출력 */
  verbose: boolean;
}

export interface CliOptions {
  verbose?: boolean;
}

export function loadEnv(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.resolve(cwd, '.env.local') });
  dotenv.config({ path: path.resolve(cwd, '.env') });
}

/** 커맨드 옵션이 환경 변수보다 우선 */
export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  return {
    verbose: options.verbose ?? parseFlag(env[ENV_KEYS.VERBOSE]),
  };
}
