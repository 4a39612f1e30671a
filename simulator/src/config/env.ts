/**
 * 환경 변수 검증 및 로드
 * Zod 스키마 기반 타입 안전 환경 설정
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';

// .env 파일 로드
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
  console.log('[Config] .env 파일 로드됨:', envPath);
}

/**
 * 환경 변수 스키마 정의
 */
const envSchema = z.object({
  // 로깅 설정
  LOGS_DIR: z.string().default('./logs'),

  LOG_CONSOLE_OUTPUT: z
    .string()
    .default('false')
    .transform((val) => val.toLowerCase() === 'true'),

  LOG_ENABLED: z
    .string()
    .default('true')
    .transform((val) => val.toLowerCase() !== 'false'),

  // 내보내기 설정
  OUTPUT_DIR: z.string().default('./output'),

  // 드론 기본값
  DEFAULT_MAX_SPEED: z
    .string()
    .default('10')
    .transform((val) => parseFloat(val))
    .refine((val) => Number.isFinite(val) && val > 0, {
      message: 'DEFAULT_MAX_SPEED는 양수여야 합니다',
    }),

  FOLLOW_SMOOTHING_FACTOR: z
    .string()
    .default('0.4')
    .transform((val) => parseFloat(val))
    .refine((val) => val > 0 && val <= 1, {
      message: 'FOLLOW_SMOOTHING_FACTOR는 0 초과 1 이하여야 합니다',
    }),

  // 환경 설정
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
});

/**
 * 환경 변수 타입
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 환경 변수 검증 및 로드
 */
export function loadAndValidateEnv(): Env {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('[Config] 환경 변수 검증 실패:');
      error.issues.forEach((err: z.ZodIssue) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('환경 변수 설정이 올바르지 않습니다');
    }
    throw error;
  }
}

/**
 * 환경 변수 출력 (디버깅용)
 */
export function printEnvConfig(env: Env): void {
  console.log('========================================');
  console.log('  환경 설정 (UAV Trace Synth)');
  console.log('========================================');
  console.log(`환경: ${env.NODE_ENV}`);
  console.log(`로그 디렉토리: ${env.LOGS_DIR}`);
  console.log(`로그 활성화: ${env.LOG_ENABLED}`);
  console.log(`콘솔 로그 출력: ${env.LOG_CONSOLE_OUTPUT}`);
  console.log(`출력 디렉토리: ${env.OUTPUT_DIR}`);
  console.log(`기본 드론 속도: ${env.DEFAULT_MAX_SPEED} m/s`);
  console.log(`추종 평활 계수: ${env.FOLLOW_SMOOTHING_FACTOR}`);
  console.log('========================================');
}
