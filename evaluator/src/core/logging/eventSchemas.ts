/**
 * 위협 평가기 이벤트 스키마 정의
 *
 * 모든 이벤트는 이 스키마를 따라야 합니다.
 * JSONL 형식으로 1줄 1이벤트 저장됩니다.
 */

import { EvaluatorErrorCode } from '../errors/errorHandler';

// ============================================
// 기본 이벤트 인터페이스
// ============================================

export interface BaseEvent {
  timestamp: number;  // Unix 시간 (ms)
  event: string;      // 이벤트 타입
}

// ============================================
// 평가기 수명 이벤트
// ============================================

export interface EvaluatorStartEvent extends BaseEvent {
  event: 'evaluator_start';
  config: {
    poll_interval_ms: number;
    dead_band_threshold: number;
    escalation_threshold: number;
    speed_ceiling: number;
    inner_radius: number;
    outer_radius: number;
    weights: { speed: number; proximity: number; identification: number };
    protected_point: { x: number; y: number };
  };
}

export interface EvaluatorSummary {
  cycles: number;
  tracks_evaluated: number;
  score_updates: number;
  engagements: number;
  rejected_tracks: number;
  failed_cycles: number;
  persist_failures: number;
}

export interface EvaluatorStopEvent extends BaseEvent {
  event: 'evaluator_stop';
  reason: 'shutdown' | 'fatal';
  summary: EvaluatorSummary;
}

// ============================================
// 트랙 이벤트
// ============================================

export interface ScoreUpdateEvent extends BaseEvent {
  event: 'score_update';
  cycle: number;
  track_id: string;
  external_ref: string;
  previous_score: number;
  score: number;
  speed: number;
  distance: number;
  risks: {
    speed: number;
    proximity: number;
    identification: number;
  };
}

export interface TrackEngagedEvent extends BaseEvent {
  event: 'track_engaged';
  cycle: number;
  track_id: string;
  external_ref: string;
  score: number;
  threshold: number;
  identification: string;
}

export interface TrackRejectedEvent extends BaseEvent {
  event: 'track_rejected';
  cycle: number;
  track_id: string;
  reason: string;
}

// ============================================
// 에러 이벤트
// ============================================

export interface CycleFailedEvent extends BaseEvent {
  event: 'cycle_failed';
  cycle: number;
  code: EvaluatorErrorCode;
  message: string;
}

export interface PersistFailedEvent extends BaseEvent {
  event: 'persist_failed';
  cycle: number;
  track_id: string | null;
  operation: 'score' | 'status' | 'commit';
  message: string;
}

// ============================================
// 통합 이벤트 타입
// ============================================

export type LogEvent =
  | EvaluatorStartEvent
  | EvaluatorStopEvent
  | ScoreUpdateEvent
  | TrackEngagedEvent
  | TrackRejectedEvent
  | CycleFailedEvent
  | PersistFailedEvent;

export type LogEventType = LogEvent['event'];
