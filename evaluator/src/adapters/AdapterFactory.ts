/**
 * Adapter Factory
 *
 * 저장소 드라이버에 따른 트랙 저장소 구현체 생성
 */

import { ITrackStore } from './ITrackStore';
import { PgTrackStore } from './PgTrackStore';
import { InMemoryTrackStore } from './InMemoryTrackStore';
import { ConfigError } from '../core/errors/errorHandler';

/**
 * 저장소 드라이버
 */
export type TrackStoreDriver = 'postgres' | 'memory';

export interface TrackStoreOptions {
  /** PostgreSQL 접속 문자열 (postgres 드라이버 필수) */
  databaseUrl?: string;
}

/**
 * Adapter Factory 클래스
 */
export class AdapterFactory {
  /**
   * 트랙 저장소 생성
   *
   * @param driver 저장소 드라이버
   * @param options 드라이버 옵션
   * @returns ITrackStore 구현체
   */
  static createTrackStore(driver: TrackStoreDriver, options: TrackStoreOptions = {}): ITrackStore {
    switch (driver) {
      case 'postgres':
        if (!options.databaseUrl) {
          throw new ConfigError('postgres 드라이버는 databaseUrl이 필요합니다');
        }
        return new PgTrackStore(options.databaseUrl);
      case 'memory':
        return new InMemoryTrackStore();
    }
  }
}
