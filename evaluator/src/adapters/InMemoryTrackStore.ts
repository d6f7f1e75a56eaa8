/**
 * 메모리 트랙 저장소
 *
 * 프로세스 내부 Map 기반 구현. 세션의 쓰기는 commit 시점에 반영된다.
 */

import { LifecycleState, TrackId, TrackRecord } from '../../../shared/schemas';
import { isAllowedTransition } from '../core/escalation/escalationPolicy';
import { ITrackStore, ITrackStoreSession } from './ITrackStore';

/** 반영된 쓰기 기록 */
export type TrackWrite =
  | { trackId: TrackId; kind: 'score'; value: number }
  | { trackId: TrackId; kind: 'status'; value: LifecycleState };

function cloneRecord(record: TrackRecord): TrackRecord {
  return { ...record, position: { ...record.position } };
}

/**
 * 메모리 저장소 세션
 */
class InMemoryTrackStoreSession implements ITrackStoreSession {
  private pending: TrackWrite[] = [];
  private released: boolean = false;

  constructor(private readonly store: InMemoryTrackStore) {}

  async fetchLiveTracks(): Promise<TrackRecord[]> {
    this.ensureActive();
    return this.store.snapshot().filter((record) => record.lifecycleState === 'LIVE');
  }

  async persistScore(trackId: TrackId, score: number): Promise<void> {
    this.ensureActive();
    this.pending.push({ trackId, kind: 'score', value: score });
  }

  async persistStatus(trackId: TrackId, status: LifecycleState): Promise<void> {
    this.ensureActive();
    this.pending.push({ trackId, kind: 'status', value: status });
  }

  async commit(): Promise<void> {
    this.ensureActive();
    const writes = this.pending;
    this.pending = [];
    writes.forEach((write) => this.store.apply(write));
  }

  async rollback(): Promise<void> {
    this.ensureActive();
    this.pending = [];
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.pending = [];
    this.released = true;
    this.store.onSessionReleased();
  }

  private ensureActive(): void {
    if (this.released) {
      throw new Error('이미 반환된 세션입니다');
    }
  }
}

export class InMemoryTrackStore implements ITrackStore {
  private tracks: Map<TrackId, TrackRecord> = new Map();
  private writes: TrackWrite[] = [];
  private openSessions: number = 0;
  private closed: boolean = false;

  constructor(initialTracks: TrackRecord[] = []) {
    initialTracks.forEach((record) => this.upsertTrack(record));
  }

  async verifyConnection(): Promise<void> {
    if (this.closed) {
      throw new Error('저장소가 종료되었습니다');
    }
  }

  async openSession(): Promise<ITrackStoreSession> {
    await this.verifyConnection();
    this.openSessions++;
    return new InMemoryTrackStoreSession(this);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ============================================
  // 트랙 생성기 역할 (외부 피드 대체)
  // ============================================

  /**
   * 트랙 추가/갱신
   */
  upsertTrack(record: TrackRecord): void {
    this.tracks.set(record.id, cloneRecord(record));
  }

  /**
   * 트랙 삭제
   */
  removeTrack(trackId: TrackId): boolean {
    return this.tracks.delete(trackId);
  }

  /**
   * 트랙 조회 (복사본)
   */
  getTrack(trackId: TrackId): TrackRecord | undefined {
    const record = this.tracks.get(trackId);
    return record ? cloneRecord(record) : undefined;
  }

  /**
   * 반영된 쓰기 기록
   */
  getWrites(trackId?: TrackId): TrackWrite[] {
    return this.writes.filter((write) => trackId === undefined || write.trackId === trackId);
  }

  /**
   * 반환되지 않은 세션 수
   */
  getOpenSessionCount(): number {
    return this.openSessions;
  }

  // ============================================
  // 세션 전용
  // ============================================

  snapshot(): TrackRecord[] {
    return Array.from(this.tracks.values(), cloneRecord);
  }

  apply(write: TrackWrite): void {
    const record = this.tracks.get(write.trackId);
    if (!record) return;

    if (write.kind === 'score') {
      record.threatScore = write.value;
    } else {
      const current = record.lifecycleState === 'ENGAGED' ? 'ENGAGED' : 'LIVE';
      if (!isAllowedTransition(current, write.value)) {
        console.warn(`[MemoryStore] ENGAGED → LIVE 역행 무시: ${write.trackId}`);
        return;
      }
      record.lifecycleState = write.value;
    }
    this.writes.push(write);
  }

  onSessionReleased(): void {
    this.openSessions = Math.max(0, this.openSessions - 1);
  }
}
