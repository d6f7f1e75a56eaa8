/**
 * PostgreSQL 트랙 저장소
 *
 * 사이클마다 풀에서 클라이언트 하나를 빌려 트랜잭션 하나로 처리한다.
 * 트랙별 쓰기는 savepoint 안에서 실행되어, 쓰기 하나가 실패해도
 * 같은 사이클의 나머지 쓰기는 유효하게 남는다.
 */

import { Pool, PoolClient, PoolConfig } from 'pg';
import { LifecycleState, TrackId, TrackRecord } from '../../../shared/schemas';
import { ITrackStore, ITrackStoreSession } from './ITrackStore';

/** tracks 테이블 행 */
export interface TrackRow {
  id: number | string;
  track_uuid: string | null;
  x_pos: number | string | null;
  y_pos: number | string | null;
  speed_knots: number | string | null;
  iff_status: string | null;
  threat_score: number | string | null;
  status: string | null;
}

const SELECT_LIVE_TRACKS = `
  select id, track_uuid, x_pos, y_pos, speed_knots, iff_status, threat_score, status
  from tracks
  where status = 'LIVE'
`;

const UPDATE_SCORE = `update tracks set threat_score = $1 where id = $2`;

// ENGAGED 트랙은 LIVE로 되돌리지 않음
const UPDATE_STATUS = `
  update tracks set status = $1
  where id = $2 and not (status = 'ENGAGED' and $1 = 'LIVE')
`;

const WRITE_SAVEPOINT = 'track_write';

/**
 * NUMERIC 컬럼은 문자열로 올 수 있음. 변환 불가 값은 NaN으로 남겨 검증 단계에서 거른다.
 */
function toNumber(value: number | string | null): number {
  if (value === null) return Number.NaN;
  return typeof value === 'number' ? value : Number(value);
}

/**
 * tracks 행 → 트랙 레코드
 */
export function mapTrackRow(row: TrackRow): TrackRecord {
  return {
    id: String(row.id),
    externalRef: row.track_uuid ?? '',
    position: { x: toNumber(row.x_pos), y: toNumber(row.y_pos) },
    speed: toNumber(row.speed_knots),
    identification: row.iff_status ?? '',
    // 아직 평가되지 않은 트랙
    threatScore: row.threat_score === null ? 0 : toNumber(row.threat_score),
    lifecycleState: row.status ?? '',
  };
}

/**
 * PostgreSQL 세션
 */
class PgTrackStoreSession implements ITrackStoreSession {
  private released: boolean = false;
  private finished: boolean = false;

  constructor(private readonly client: PoolClient) {}

  async fetchLiveTracks(): Promise<TrackRecord[]> {
    const r = await this.client.query<TrackRow>(SELECT_LIVE_TRACKS);
    return r.rows.map(mapTrackRow);
  }

  async persistScore(trackId: TrackId, score: number): Promise<void> {
    await this.withSavepoint(UPDATE_SCORE, [score, trackId]);
  }

  async persistStatus(trackId: TrackId, status: LifecycleState): Promise<void> {
    await this.withSavepoint(UPDATE_STATUS, [status, trackId]);
  }

  async commit(): Promise<void> {
    await this.client.query('commit');
    this.finished = true;
  }

  async rollback(): Promise<void> {
    await this.client.query('rollback');
    this.finished = true;
  }

  /**
   * 열린 트랜잭션이 남아 있으면 롤백 후 반환. 롤백도 실패한 클라이언트는 풀에서 폐기한다.
   */
  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    if (!this.finished) {
      try {
        await this.client.query('rollback');
      } catch (error) {
        this.client.release(error instanceof Error ? error : true);
        return;
      }
    }
    this.client.release();
  }

  private async withSavepoint(sql: string, values: unknown[]): Promise<void> {
    await this.client.query(`savepoint ${WRITE_SAVEPOINT}`);
    try {
      await this.client.query(sql, values);
      await this.client.query(`release savepoint ${WRITE_SAVEPOINT}`);
    } catch (error) {
      await this.client.query(`rollback to savepoint ${WRITE_SAVEPOINT}`);
      throw error;
    }
  }
}

export class PgTrackStore implements ITrackStore {
  private pool: Pool;

  constructor(config: string | PoolConfig) {
    this.pool = new Pool(typeof config === 'string' ? { connectionString: config } : config);
    // 유휴 클라이언트 에러가 프로세스를 종료시키지 않도록 처리
    this.pool.on('error', (error) => {
      console.error('[PgStore] 유휴 클라이언트 에러:', error.message);
    });
  }

  async verifyConnection(): Promise<void> {
    const r = await this.pool.query('select 1 as ok');
    if (!r.rows.length) throw new Error('pg ping failed');
  }

  async openSession(): Promise<ITrackStoreSession> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw error;
    }
    return new PgTrackStoreSession(client);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
