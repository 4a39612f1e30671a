#!/usr/bin/env node
/**
 * UAV 궤적 합성기
 * 진입점 (CLI)
 */

import { runScenarioFile } from './core/scenario/runFile';
import { ErrorLogger, isSynthesisError } from './core/errors/errorHandler';

const USAGE = `
UAV 궤적 합성기 (UAV Trace Synth)

사용법:
  uav-trace-synth --run -i <run-file.json>
  uav-trace-synth --help

옵션:
  --run          실행 파일의 그룹을 순서대로 실행
  -i, --input    실행 파일 경로 (JSON)
  --setup        대화형 좌표 선택기 (이 빌드에서는 지원하지 않음)
  -h, --help     사용법 출력

환경 변수 (.env):
  LOGS_DIR, LOG_ENABLED, LOG_CONSOLE_OUTPUT, OUTPUT_DIR,
  DEFAULT_MAX_SPEED, FOLLOW_SMOOTHING_FACTOR, NODE_ENV
`;

/**
 * -i / --input 다음 인자
 */
function readInputArg(args: string[]): string | null {
  const index = args.findIndex((arg) => arg === '-i' || arg === '--input');
  if (index < 0 || index + 1 >= args.length) return null;
  return args[index + 1];
}

export function main(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  if (args.includes('--setup')) {
    console.error('[CLI] --setup (대화형 좌표 선택기)은 지원하지 않습니다');
    return 1;
  }

  if (!args.includes('--run')) {
    console.error('[CLI] 알 수 없는 명령입니다. --help 를 확인하세요');
    return 1;
  }

  const input = readInputArg(args);
  if (!input) {
    console.error('[CLI] --run 에는 -i <run-file.json> 이 필요합니다');
    return 1;
  }

  console.log('========================================');
  console.log('  UAV 궤적 합성기');
  console.log('========================================');

  try {
    const report = runScenarioFile(input);
    console.log(`[CLI] 실행 완료 (${report.runId})`);
    console.log(`  - 실행 그룹: ${report.groups.length}개`);
    console.log(`  - 생성 드론: ${report.droneIds.join(', ') || '없음'}`);
    console.log(`  - 내보내기: ${report.exports.length}개`);
    if (report.skipped.length > 0) {
      console.log(`  - 건너뛴 그룹: ${report.skipped.join(', ')}`);
    }
    return 0;
  } catch (error) {
    const code = isSynthesisError(error) ? ` (${error.code})` : '';
    console.error(`[CLI] 실행 실패${code}:`, error instanceof Error ? error.message : error);
    ErrorLogger.getInstance().printStats();
    return 1;
  }
}

if (require.main === module) {
  process.exit(main(process.argv.slice(2)));
}
