/**
 * 기본 커맨드 — 입력 파일로 그래프를 구성하고 고정 질의 묶음 실행
 * 사용법: transit-routes <input-file> [--verbose]
 */
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { RouteGraph } from '@transit-routes/core';
import { USAGE_MESSAGE } from '@transit-routes/shared';
import { runBattery } from '../battery';
import { resolveConfig } from '../config';
import type { CliOptions } from '../config';

/** 입력 파일 읽기 실패 */
export class FileUnreadableError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super(`Unable to read input file: ${filePath}`, { cause });
    this.name = 'FileUnreadableError';
    this.filePath = filePath;
  }
}

export function readInput(filePath: string): string {
  const resolved = resolve(filePath);
  try {
    return readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new FileUnreadableError(resolved, error);
  }
}

export function createRunCommand(): Command {
  return new Command('transit-routes')
    .description('입력 edge 목록으로 노선 그래프를 구성하고 고정 질의 10개를 실행합니다')
    .version('0.1.0', '-v, --version', '버전 출력')
    .argument('[inputs...]', '입력 파일 경로 (하나)')
    .option('--verbose', '그래프 통계와 질의별 소요 시간 출력')
    .action((inputs: string[], options: CliOptions) => {
      const [filePath] = inputs;
      if (inputs.length !== 1 || filePath === undefined) {
        console.log(USAGE_MESSAGE);
        return;
      }

      const config = resolveConfig(options);
      const spinner = ora('그래프 구성 중...').start();

      let graph: RouteGraph;
      try {
        graph = RouteGraph.parse(readInput(filePath));
      } catch (error) {
        spinner.fail(chalk.red('그래프 구성 실패'));
        console.error(error);
        process.exit(1);
      }

      spinner.succeed(chalk.green('그래프 구성 완료'));
      if (config.verbose) {
        console.error(chalk.dim(`  역: ${graph.stations().length}개`));
        console.error(chalk.dim(`  구간: ${graph.edgeCount}개`));
      }

      for (const { entry, response, line } of runBattery(graph)) {
        console.log(line);
        if (config.verbose) {
          console.error(chalk.dim(`  ${entry.name}: ${response.meta.executionMs}ms`));
        }
      }
    });
}
