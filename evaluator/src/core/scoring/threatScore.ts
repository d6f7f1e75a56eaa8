/**
 * 위협 점수 계산 모듈
 *
 * 트랙의 속도, 보호 지점 근접도, 식별 상태를 가중 합산하여
 * 위협 점수(0~100 정수)를 계산합니다.
 *
 * 주요 요소:
 * 1. 속도 위험도 (speed / speedCeiling)
 * 2. 근접 위험도 (내측/외측 반경 계단 함수)
 * 3. 식별 위험도 (FRIENDLY / UNKNOWN / HOSTILE)
 */

import { Track } from '../../../../shared/schemas';
import { ConfigError } from '../errors/errorHandler';
import {
  computeDistance,
  computeIdentificationRisk,
  computeProximityRisk,
  computeSpeedRisk,
} from './riskFactors';
import {
  ScoringConfig,
  ThreatScoreBreakdown,
  ThreatScoreWeights,
  WEIGHT_SUM_TOLERANCE,
} from './types';

// ============================================
// 위협 점수 설정
// ============================================

export const DEFAULT_THREAT_WEIGHTS: ThreatScoreWeights = {
  speed: 0.3,
  proximity: 0.4,
  identification: 0.3,
};

export const DEFAULT_SCORING_CONFIG: ScoringConfig = {
  speedCeiling: 1500,
  innerRadius: 100,
  outerRadius: 300,
  weights: DEFAULT_THREAT_WEIGHTS,
  protectedPoint: { x: 400, y: 300 },
};

/**
 * 점수 설정 검증
 * @throws ConfigError 가중치 합이 1.0이 아니거나 반경/속도 상한이 잘못된 경우
 */
export function validateScoringConfig(config: ScoringConfig): void {
  const { speed, proximity, identification } = config.weights;
  const sum = speed + proximity + identification;

  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigError(`가중치 합은 1.0이어야 합니다 (현재 ${sum})`);
  }
  if ([speed, proximity, identification].some((w) => w < 0)) {
    throw new ConfigError('가중치는 음수일 수 없습니다');
  }
  if (!(config.speedCeiling > 0)) {
    throw new ConfigError(`speedCeiling은 양수여야 합니다 (현재 ${config.speedCeiling})`);
  }
  if (!(config.innerRadius > 0 && config.innerRadius < config.outerRadius)) {
    throw new ConfigError(
      `0 < innerRadius < outerRadius 이어야 합니다 (현재 ${config.innerRadius}, ${config.outerRadius})`
    );
  }
}

// ============================================
// 메인 위협 점수 계산
// ============================================

/**
 * 위협 점수 상세 분석
 *
 * 가중 합을 [0, 100]으로 제한한 뒤 소수점 이하를 버린다.
 */
export function computeThreatScoreBreakdown(
  track: Pick<Track, 'position' | 'speed' | 'identification'>,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): ThreatScoreBreakdown {
  const { weights } = config;

  const speedRisk = computeSpeedRisk(track.speed, config.speedCeiling);
  const distance = computeDistance(track.position, config.protectedPoint);
  const proximityRisk = computeProximityRisk(distance, config.innerRadius, config.outerRadius);
  const identificationRisk = computeIdentificationRisk(track.identification);

  const weighted =
    speedRisk * weights.speed +
    proximityRisk * weights.proximity +
    identificationRisk * weights.identification;

  return {
    distance,
    speedRisk,
    proximityRisk,
    identificationRisk,
    weighted,
    total: Math.trunc(Math.max(0, Math.min(100, weighted))),
  };
}

/**
 * 위협 점수 계산 (0~100)
 */
export function computeThreatScore(
  track: Pick<Track, 'position' | 'speed' | 'identification'>,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG
): number {
  return computeThreatScoreBreakdown(track, config).total;
}
