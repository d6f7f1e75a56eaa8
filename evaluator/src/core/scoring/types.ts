/**
 * 위협 점수 타입 정의
 */

import { Position2D } from '../../../../shared/schemas';

/** 가중치 합 허용 오차 */
export const WEIGHT_SUM_TOLERANCE = 1e-9;

/** 위협 점수 가중치 (합 = 1.0) */
export interface ThreatScoreWeights {
  /** 속도 위험도 가중치 */
  speed: number;
  /** 근접 위험도 가중치 */
  proximity: number;
  /** 식별 위험도 가중치 */
  identification: number;
}

export interface ScoringConfig {
  /** 속도 위험도 100에 해당하는 기준 속도 */
  speedCeiling: number;
  /** 이 거리 미만이면 근접 위험도 100 */
  innerRadius: number;
  /** 이 거리 미만이면 근접 위험도 50, 이상이면 0 */
  outerRadius: number;
  weights: ThreatScoreWeights;
  /** 보호 지점 */
  protectedPoint: Position2D;
}

/** 위험 요소별 점수 상세 */
export interface ThreatScoreBreakdown {
  /** 보호 지점까지 거리 */
  distance: number;
  speedRisk: number;
  proximityRisk: number;
  identificationRisk: number;
  /** 가중 합 (절삭 전) */
  weighted: number;
  /** 최종 점수 (0~100 정수) */
  total: number;
}
