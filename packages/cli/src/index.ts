#!/usr/bin/env node
/**
 * transit-routes CLI 메인 진입점
 * Commander.js 기반 CLI 구성
 */
import chalk from 'chalk';
import { createRunCommand } from './commands/run';
import { loadEnv } from './config';

loadEnv();

const program = createRunCommand();

// 알 수 없는 옵션 처리
program.showHelpAfterError(chalk.dim('transit-routes --help 를 실행하여 사용법을 확인하세요.'));

program.parse(process.argv);
