/**
 * 환경 변수 검증 및 로드
 * Zod 스키마 기반 타입 안전 환경 설정
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { ConfigError } from '../core/errors/errorHandler';
import { WEIGHT_SUM_TOLERANCE } from '../core/scoring/types';

// .env 파일 로드
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
  console.log('[Config] .env 파일 로드됨:', envPath);
}

/**
 * 실수형 환경 변수
 */
function numberVar(defaultValue: string, name: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => Number(val.trim()))
    .refine((val) => Number.isFinite(val), {
      message: `${name}은(는) 숫자여야 합니다`,
    });
}

function booleanVar(defaultValue: 'true' | 'false') {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => val.toLowerCase() === 'true');
}

/**
 * 환경 변수 스키마 정의
 */
const envSchema = z
  .object({
    // 저장소 설정
    STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().optional(),

    // 평가 루프 설정
    POLL_INTERVAL_SECONDS: numberVar('0.5', 'POLL_INTERVAL_SECONDS').refine((val) => val > 0, {
      message: 'POLL_INTERVAL_SECONDS는 양수여야 합니다',
    }),
    DEAD_BAND_THRESHOLD: numberVar('2', 'DEAD_BAND_THRESHOLD').refine((val) => val >= 0, {
      message: 'DEAD_BAND_THRESHOLD는 0 이상이어야 합니다',
    }),
    ESCALATION_THRESHOLD: numberVar('90', 'ESCALATION_THRESHOLD').refine(
      (val) => val >= 0 && val <= 100,
      { message: 'ESCALATION_THRESHOLD는 0-100 사이여야 합니다' }
    ),

    // 위협 점수 설정
    SPEED_CEILING: numberVar('1500', 'SPEED_CEILING').refine((val) => val > 0, {
      message: 'SPEED_CEILING은 양수여야 합니다',
    }),
    INNER_RADIUS: numberVar('100', 'INNER_RADIUS'),
    OUTER_RADIUS: numberVar('300', 'OUTER_RADIUS'),
    WEIGHT_SPEED: numberVar('0.3', 'WEIGHT_SPEED'),
    WEIGHT_PROXIMITY: numberVar('0.4', 'WEIGHT_PROXIMITY'),
    WEIGHT_IDENTIFICATION: numberVar('0.3', 'WEIGHT_IDENTIFICATION'),
    PROTECTED_POINT_X: numberVar('400', 'PROTECTED_POINT_X'),
    PROTECTED_POINT_Y: numberVar('300', 'PROTECTED_POINT_Y'),

    // 로깅 설정
    LOGS_DIR: z.string().default('./logs'),
    LOG_ENABLED: booleanVar('true'),
    LOG_CONSOLE_OUTPUT: booleanVar('false'),

    // 환경 설정
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.INNER_RADIUS <= 0 || env.INNER_RADIUS >= env.OUTER_RADIUS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['INNER_RADIUS'],
        message: '0 < INNER_RADIUS < OUTER_RADIUS 이어야 합니다',
      });
    }

    const weightSum = env.WEIGHT_SPEED + env.WEIGHT_PROXIMITY + env.WEIGHT_IDENTIFICATION;
    if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WEIGHT_SPEED'],
        message: `가중치 합은 1.0이어야 합니다 (현재 ${weightSum})`,
      });
    }

    if (env.STORE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'STORE_DRIVER가 postgres일 때 DATABASE_URL은 필수입니다',
      });
    }
  });

/**
 * 환경 변수 타입
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 환경 변수 검증 및 로드
 */
export function loadAndValidateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('[Config] 환경 변수 검증 실패:');
    const issues = result.error.issues.map(
      (issue: z.ZodIssue) => `${issue.path.join('.')}: ${issue.message}`
    );
    issues.forEach((issue) => console.error(`  - ${issue}`));
    throw new ConfigError('환경 변수 설정이 올바르지 않습니다', { details: { issues } });
  }

  const env = result.data;
  if (env.NODE_ENV === 'production' && env.STORE_DRIVER === 'memory') {
    console.warn('[Config] 경고: 프로덕션 환경에서 메모리 저장소를 사용하고 있습니다');
  }

  return env;
}

/**
 * 환경 변수 출력 (디버깅용, 민감한 정보 마스킹)
 */
export function printEnvConfig(env: Env): void {
  console.log('========================================');
  console.log('  환경 설정 (Threat Evaluator)');
  console.log('========================================');
  console.log(`환경: ${env.NODE_ENV}`);
  console.log(`저장소: ${env.STORE_DRIVER}`);
  if (env.STORE_DRIVER === 'postgres') {
    console.log(`DB URL: ${maskConnectionString(env.DATABASE_URL)}`);
  }
  console.log(`폴링 주기: ${env.POLL_INTERVAL_SECONDS}s`);
  console.log(`데드밴드: ${env.DEAD_BAND_THRESHOLD}`);
  console.log(`교전 임계값: ${env.ESCALATION_THRESHOLD}`);
  console.log('----------------------------------------');
  console.log(`속도 상한: ${env.SPEED_CEILING}`);
  console.log(`반경: ${env.INNER_RADIUS} / ${env.OUTER_RADIUS}`);
  console.log(
    `가중치: speed=${env.WEIGHT_SPEED} proximity=${env.WEIGHT_PROXIMITY} iff=${env.WEIGHT_IDENTIFICATION}`
  );
  console.log(`보호 지점: (${env.PROTECTED_POINT_X}, ${env.PROTECTED_POINT_Y})`);
  console.log('----------------------------------------');
  console.log(`로그 디렉토리: ${env.LOGS_DIR}`);
  console.log(`로그 활성화: ${env.LOG_ENABLED}`);
  console.log(`콘솔 로그 출력: ${env.LOG_CONSOLE_OUTPUT}`);
  console.log('========================================');
}

/**
 * 접속 문자열의 비밀번호 마스킹 (보안)
 */
export function maskConnectionString(url?: string): string {
  if (!url) return '(설정되지 않음)';
  return url.replace(/\/\/([^:/@]+):([^@]*)@/, '//$1:****@');
}
