/**
 * 테스트 공통 픽스처
 */

import { Track, TrackRecord } from '../../../../shared/schemas';
import { DEFAULT_SCORING_CONFIG } from '../../core/scoring/threatScore';
import { ScoringConfig } from '../../core/scoring/types';

/** 보호 지점을 원점에 둔 점수 설정 */
export const TEST_SCORING_CONFIG: ScoringConfig = {
  ...DEFAULT_SCORING_CONFIG,
  protectedPoint: { x: 0, y: 0 },
};

export function createTestTrack(overrides?: Partial<Track>): Track;
export function createTestTrack(overrides?: Partial<TrackRecord>): TrackRecord;
export function createTestTrack(overrides: Partial<TrackRecord> = {}): TrackRecord {
  return {
    id: 'T1',
    externalRef: 'track-0001',
    position: { x: 0, y: 0 },
    speed: 0,
    identification: 'UNKNOWN',
    threatScore: 0,
    lifecycleState: 'LIVE',
    ...overrides,
  };
}
