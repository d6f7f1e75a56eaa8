/**
 * 위험 요소 계산 함수
 *
 * 각 함수는 트랙 속성 하나를 0~100 위험도로 변환한다.
 */

import { Identification, Position2D } from '../../../../shared/schemas';
import { DataError } from '../errors/errorHandler';

/** 근접 위험도 단계 */
export const PROXIMITY_RISK_INNER = 100;
export const PROXIMITY_RISK_OUTER = 50;

/** 식별 상태별 위험도 */
export const IDENTIFICATION_RISK: Readonly<Record<Identification, number>> = {
  FRIENDLY: 0,
  UNKNOWN: 40,
  HOSTILE: 100,
};

/**
 * 속도 위험도: 기준 속도까지 선형 증가, 100에서 포화
 */
export function computeSpeedRisk(speed: number, speedCeiling: number): number {
  return Math.min(100, (speed / speedCeiling) * 100);
}

/**
 * 보호 지점까지의 유클리드 거리
 */
export function computeDistance(position: Position2D, protectedPoint: Position2D): number {
  const dx = position.x - protectedPoint.x;
  const dy = position.y - protectedPoint.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * 근접 위험도 (계단 함수)
 * - d < innerRadius → 100
 * - innerRadius ≤ d < outerRadius → 50
 * - d ≥ outerRadius → 0
 */
export function computeProximityRisk(
  distance: number,
  innerRadius: number,
  outerRadius: number
): number {
  if (distance < innerRadius) return PROXIMITY_RISK_INNER;
  if (distance < outerRadius) return PROXIMITY_RISK_OUTER;
  return 0;
}

function isIdentification(value: string): value is Identification {
  return Object.prototype.hasOwnProperty.call(IDENTIFICATION_RISK, value);
}

/**
 * 식별 위험도
 * @throws DataError 알려진 식별 상태가 아닌 경우
 */
export function computeIdentificationRisk(identification: string): number {
  if (!isIdentification(identification)) {
    throw new DataError(`알 수 없는 식별 상태: ${identification}`, {
      details: { identification },
    });
  }
  return IDENTIFICATION_RISK[identification];
}
