/**
 * 트랙 저장소 게이트웨이 인터페이스
 *
 * PostgreSQL 저장소와 메모리 저장소를 추상화
 */

import { LifecycleState, TrackId, TrackRecord } from '../../../shared/schemas';

/**
 * 사이클 단위 저장소 세션
 *
 * 한 평가 사이클 동안만 유효하며, 사이클 종료 시 반드시 release 해야 함
 */
export interface ITrackStoreSession {
  /**
   * LIVE 상태 트랙 전체 조회 (스냅샷)
   *
   * @returns 검증 전 트랙 레코드 배열
   */
  fetchLiveTracks(): Promise<TrackRecord[]>;

  /**
   * 위협 점수 저장 (멱등)
   *
   * @param trackId 트랙 ID
   * @param score 새 위협 점수
   */
  persistScore(trackId: TrackId, score: number): Promise<void>;

  /**
   * 생명주기 상태 저장 (멱등)
   *
   * ENGAGED → LIVE 역행은 무시됨
   *
   * @param trackId 트랙 ID
   * @param status 새 상태
   */
  persistStatus(trackId: TrackId, status: LifecycleState): Promise<void>;

  /**
   * 이번 사이클의 쓰기 확정
   */
  commit(): Promise<void>;

  /**
   * 이번 사이클의 쓰기 취소
   */
  rollback(): Promise<void>;

  /**
   * 세션 자원 반환
   */
  release(): Promise<void>;
}

/**
 * 트랙 저장소 인터페이스
 *
 * 모든 저장소 구현체는 이 인터페이스를 따라야 함
 */
export interface ITrackStore {
  /**
   * 저장소 연결 확인 (기동 시)
   */
  verifyConnection(): Promise<void>;

  /**
   * 사이클 세션 획득
   */
  openSession(): Promise<ITrackStoreSession>;

  /**
   * 저장소 종료
   */
  close(): Promise<void>;
}
