/**
 * 트랙 저장소 공통 스키마 정의
 *
 * 트랙 생성기(레이더/시뮬레이션 피드) ↔ 위협 평가기 간 공유 데이터 계약
 */

import { z } from 'zod';

// ============================================
// 기본 타입
// ============================================

/** 식별 상태 (IFF) */
export const IDENTIFICATIONS = ['FRIENDLY', 'UNKNOWN', 'HOSTILE'] as const;
export type Identification = (typeof IDENTIFICATIONS)[number];

/** 트랙 생명주기 상태 */
export const LIFECYCLE_STATES = ['LIVE', 'ENGAGED'] as const;
export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

/** 트랙 ID (저장소가 부여, 불투명 값) */
export type TrackId = string;

/** 2D 위치 */
export interface Position2D {
  x: number;
  y: number;
}

// ============================================
// 저장소 레코드
// ============================================

/**
 * 저장소에서 읽은 원시 트랙 레코드 (검증 전)
 *
 * 외부 생성기가 기록한 값이므로 식별/상태 값이 알려진 집합 밖이거나
 * 좌표/속도가 유한한 수가 아닐 수 있다.
 */
export interface TrackRecord {
  id: TrackId;
  externalRef: string;
  position: Position2D;
  speed: number;
  identification: string;
  threatScore: number;
  lifecycleState: string;
}

const finiteNumber = z.number().finite();

/**
 * 검증된 트랙 스키마
 */
export const trackSchema = z.object({
  id: z.string().min(1),
  externalRef: z.string(),
  position: z.object({
    x: finiteNumber,
    y: finiteNumber,
  }),
  speed: finiteNumber.nonnegative(),
  identification: z.enum(IDENTIFICATIONS),
  // 평가기가 매 사이클 덮어쓰는 값이므로 범위는 검사하지 않음
  threatScore: z.union([z.number(), z.nan()]),
  lifecycleState: z.enum(LIFECYCLE_STATES),
});

/** 평가 대상 트랙 */
export type Track = z.infer<typeof trackSchema>;
