/**
 * 자동 교전 정책
 *
 * LIVE → ENGAGED 단방향 상태 전이. 이 평가기는 ENGAGED 트랙을 LIVE로 되돌리지 않는다.
 */

import { LifecycleState } from '../../../../shared/schemas';

/** 기본 교전 임계값 (이 값을 초과하면 교전) */
export const DEFAULT_ESCALATION_THRESHOLD = 90;

/** 교전 결정 */
export type EscalationDecision =
  | { transition: 'ENGAGE'; from: 'LIVE'; to: 'ENGAGED'; score: number; threshold: number }
  | { transition: 'NONE'; state: LifecycleState; score: number; threshold: number };

/**
 * 교전 여부 결정
 *
 * 데드밴드와 무관하게 이번 사이클에 새로 계산된 점수로 판단한다.
 */
export function decideEscalation(
  score: number,
  currentState: LifecycleState,
  threshold: number = DEFAULT_ESCALATION_THRESHOLD
): EscalationDecision {
  if (currentState === 'LIVE' && score > threshold) {
    return { transition: 'ENGAGE', from: 'LIVE', to: 'ENGAGED', score, threshold };
  }
  return { transition: 'NONE', state: currentState, score, threshold };
}

/**
 * 상태 전이 허용 여부 (ENGAGED → LIVE 역행 금지)
 */
export function isAllowedTransition(from: LifecycleState, to: LifecycleState): boolean {
  return !(from === 'ENGAGED' && to === 'LIVE');
}
