/**
 * 위협 평가기 설정 관리
 * 환경 변수 기반 설정 로더 (Zod 검증 포함)
 */

import { loadAndValidateEnv, printEnvConfig, type Env } from './config/env';
import { ScoringConfig } from './core/scoring/types';
import { TrackStoreDriver } from './adapters/AdapterFactory';

export interface EvaluatorConfig {
  /** 사이클 간 대기 시간 (ms) */
  pollIntervalMs: number;
  /** 점수 저장 데드밴드 */
  deadBandThreshold: number;
  /** 자동 교전 임계값 */
  escalationThreshold: number;
  scoring: ScoringConfig;
  storeDriver: TrackStoreDriver;
  databaseUrl?: string;
  logsDir: string;
  logEnabled: boolean;
  logConsoleOutput: boolean;
  nodeEnv: string;
}

/**
 * 환경 변수에서 설정 로드 (검증 포함)
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): EvaluatorConfig {
  const env: Env = loadAndValidateEnv(source);

  // 개발 모드에서 설정 출력
  if (env.NODE_ENV === 'development') {
    printEnvConfig(env);
  }

  return {
    pollIntervalMs: Math.round(env.POLL_INTERVAL_SECONDS * 1000),
    deadBandThreshold: env.DEAD_BAND_THRESHOLD,
    escalationThreshold: env.ESCALATION_THRESHOLD,
    scoring: {
      speedCeiling: env.SPEED_CEILING,
      innerRadius: env.INNER_RADIUS,
      outerRadius: env.OUTER_RADIUS,
      weights: {
        speed: env.WEIGHT_SPEED,
        proximity: env.WEIGHT_PROXIMITY,
        identification: env.WEIGHT_IDENTIFICATION,
      },
      protectedPoint: { x: env.PROTECTED_POINT_X, y: env.PROTECTED_POINT_Y },
    },
    storeDriver: env.STORE_DRIVER,
    databaseUrl: env.DATABASE_URL,
    logsDir: env.LOGS_DIR,
    logEnabled: env.LOG_ENABLED,
    logConsoleOutput: env.LOG_CONSOLE_OUTPUT,
    nodeEnv: env.NODE_ENV,
  };
}

/**
 * 기본 설정 인스턴스 (싱글톤)
 */
let configInstance: EvaluatorConfig | null = null;

/**
 * 설정 싱글톤 가져오기
 */
export function getConfig(): EvaluatorConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}
