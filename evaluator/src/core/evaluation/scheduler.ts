/**
 * 평가 사이클 스케줄러
 *
 * 사이클 사이의 대기를 추상화하여 테스트에서 틱을 직접 주입할 수 있게 한다.
 */

export type ScheduledTask = () => Promise<void>;

/** 예약된 작업 핸들 */
export interface ScheduledHandle {
  cancel(): void;
}

export interface IScheduler {
  /**
   * delayMs 후 작업 1회 실행
   */
  schedule(task: ScheduledTask, delayMs: number): ScheduledHandle;
}

/**
 * setTimeout 기반 스케줄러
 */
export class TimerScheduler implements IScheduler {
  schedule(task: ScheduledTask, delayMs: number): ScheduledHandle {
    const timer = setTimeout(() => {
      task().catch((error: unknown) => {
        console.error('[Scheduler] 예약 작업 실패:', error);
      });
    }, delayMs);

    return {
      cancel: () => clearTimeout(timer),
    };
  }
}
