/**
 * 데드밴드 갱신 필터
 */

/** 기본 데드밴드 */
export const DEFAULT_DEAD_BAND_THRESHOLD = 2;

/**
 * 저장된 점수가 정상 범위(0-100 정수)인지 여부
 */
export function isStoredScoreValid(storedScore: number): boolean {
  return Number.isInteger(storedScore) && storedScore >= 0 && storedScore <= 100;
}

/**
 * 새 점수 저장 여부: |new - stored| > threshold (엄격 부등호)
 *
 * 저장된 점수가 범위를 벗어나면 차이와 무관하게 다시 쓴다.
 */
export function shouldPersistScore(
  newScore: number,
  storedScore: number,
  threshold: number = DEFAULT_DEAD_BAND_THRESHOLD
): boolean {
  if (!isStoredScoreValid(storedScore)) return true;
  return Math.abs(newScore - storedScore) > threshold;
}
