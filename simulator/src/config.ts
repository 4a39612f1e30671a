/**
 * 합성기 설정 관리
 * 환경 변수 기반 설정 로더 (Zod 검증 포함)
 */

import { loadAndValidateEnv, printEnvConfig, type Env } from './config/env';

export interface SimulatorConfig {
  logsDir: string;
  logConsoleOutput: boolean;
  logEnabled: boolean;
  outputDir: string;
  defaultMaxSpeed: number;
  followSmoothingFactor: number;
  nodeEnv: string;
}

/**
 * 환경 변수에서 설정 로드 (검증 포함)
 */
export function loadConfig(): SimulatorConfig {
  const env: Env = loadAndValidateEnv();

  // 개발 모드에서 설정 출력
  if (env.NODE_ENV === 'development') {
    printEnvConfig(env);
  }

  return {
    logsDir: env.LOGS_DIR,
    logConsoleOutput: env.LOG_CONSOLE_OUTPUT,
    logEnabled: env.LOG_ENABLED,
    outputDir: env.OUTPUT_DIR,
    defaultMaxSpeed: env.DEFAULT_MAX_SPEED,
    followSmoothingFactor: env.FOLLOW_SMOOTHING_FACTOR,
    nodeEnv: env.NODE_ENV,
  };
}

/**
 * 기본 설정 인스턴스 (싱글톤)
 */
let configInstance: SimulatorConfig | null = null;

/**
 * 설정 싱글톤 가져오기
 */
export function getConfig(): SimulatorConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
