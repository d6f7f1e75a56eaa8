/**
 * 트랙 레코드 검증
 */

import { Track, TrackRecord, trackSchema } from '../../../../shared/schemas';
import { DataError } from '../errors/errorHandler';

/**
 * 원시 레코드 → 평가 대상 트랙
 * @throws DataError 식별 상태가 알려진 집합 밖이거나 위치/속도가 잘못된 경우
 */
export function validateTrack(record: TrackRecord): Track {
  const result = trackSchema.safeParse(record);
  if (result.success) {
    return result.data;
  }

  const reasons = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  throw new DataError(`잘못된 트랙 레코드 ${record.id}: ${reasons.join('; ')}`, {
    details: { trackId: record.id, reasons },
  });
}
