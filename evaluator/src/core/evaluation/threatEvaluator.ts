/**
 * 위협 평가 루프
 *
 * 주기마다 LIVE 트랙을 읽어 위협 점수를 재계산하고,
 * 데드밴드를 넘은 점수와 자동 교전 전이를 저장소에 기록한다.
 *
 * 주요 기능:
 * 1. 사이클 실행 (runCycle) - 세션 획득 → 조회 → 평가 → commit → 반환
 * 2. 스케줄러 기반 반복 (start / stop)
 * 3. 에러 분류: 연결 실패는 루프 정지, 그 외는 로그 후 계속
 *
 * 저장소당 평가기 인스턴스는 하나만 실행해야 한다 (점수/상태 쓰기에 동시성 제어 없음).
 */

import { Track, TrackRecord } from '../../../../shared/schemas';
import { ITrackStore, ITrackStoreSession } from '../../adapters/ITrackStore';
import { decideEscalation, DEFAULT_ESCALATION_THRESHOLD } from '../escalation/escalationPolicy';
import {
  ConfigError,
  ConnectionError,
  DataError,
  describeError,
  ErrorLogger,
  EvaluatorError,
  FetchError,
  isFatalError,
  PersistError,
  toEvaluatorError,
} from '../errors/errorHandler';
import { EvaluatorSummary, PersistFailedEvent } from '../logging/eventSchemas';
import { EvaluatorLogger } from '../logging/logger';
import { DEFAULT_SCORING_CONFIG, computeThreatScoreBreakdown, validateScoringConfig } from '../scoring/threatScore';
import { ScoringConfig, ThreatScoreBreakdown } from '../scoring/types';
import { DEFAULT_DEAD_BAND_THRESHOLD, shouldPersistScore } from './deadBand';
import { IScheduler, ScheduledHandle, TimerScheduler } from './scheduler';
import { validateTrack } from './trackValidation';

// ============================================
// 타입 정의
// ============================================

/** 평가 루프 상태 */
export type EvaluatorState = 'IDLE' | 'RUNNING' | 'STOPPED';

/** 기본 폴링 주기 (ms) */
export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface ThreatEvaluatorOptions {
  store: ITrackStore;
  scoring?: ScoringConfig;
  deadBandThreshold?: number;
  escalationThreshold?: number;
  pollIntervalMs?: number;
  scheduler?: IScheduler;
  logger?: EvaluatorLogger;
  errorLogger?: ErrorLogger;
  /** 치명적 에러로 루프가 정지했을 때 호출 */
  onFatal?: (error: EvaluatorError) => void;
}

/** 사이클 결과 */
export interface CycleReport {
  cycle: number;
  /** 조회된 LIVE 트랙 수 */
  fetched: number;
  /** 점수 계산까지 완료된 트랙 수 */
  evaluated: number;
  /** LIVE가 아니어서 건너뛴 트랙 수 */
  skipped: number;
  scoreWrites: number;
  engagements: number;
  dataErrors: number;
  persistErrors: number;
  fetchFailed: boolean;
  committed: boolean;
  durationMs: number;
}

/** 누적 통계 */
export interface EvaluatorStats {
  cycles: number;
  tracksEvaluated: number;
  scoreWrites: number;
  engagements: number;
  dataErrors: number;
  fetchFailures: number;
  persistErrors: number;
}

// ============================================
// 위협 평가기 클래스
// ============================================

export class ThreatEvaluator {
  private readonly store: ITrackStore;
  private readonly scoring: ScoringConfig;
  private readonly deadBandThreshold: number;
  private readonly escalationThreshold: number;
  private readonly pollIntervalMs: number;
  private readonly scheduler: IScheduler;
  private readonly logger: EvaluatorLogger;
  private readonly errorLogger: ErrorLogger;
  private readonly onFatal?: (error: EvaluatorError) => void;

  private state: EvaluatorState = 'IDLE';
  private pending: ScheduledHandle | null = null;
  private inFlight: Promise<void> | null = null;
  private cycleCount: number = 0;
  private stats: EvaluatorStats = {
    cycles: 0,
    tracksEvaluated: 0,
    scoreWrites: 0,
    engagements: 0,
    dataErrors: 0,
    fetchFailures: 0,
    persistErrors: 0,
  };

  constructor(options: ThreatEvaluatorOptions) {
    this.store = options.store;
    this.scoring = options.scoring ?? DEFAULT_SCORING_CONFIG;
    this.deadBandThreshold = options.deadBandThreshold ?? DEFAULT_DEAD_BAND_THRESHOLD;
    this.escalationThreshold = options.escalationThreshold ?? DEFAULT_ESCALATION_THRESHOLD;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.scheduler = options.scheduler ?? new TimerScheduler();
    this.logger = options.logger ?? new EvaluatorLogger({ enabled: false });
    this.errorLogger = options.errorLogger ?? new ErrorLogger();
    this.onFatal = options.onFatal;

    validateScoringConfig(this.scoring);
    if (this.deadBandThreshold < 0) {
      throw new ConfigError(`deadBandThreshold는 0 이상이어야 합니다 (현재 ${this.deadBandThreshold})`);
    }
    if (!(this.pollIntervalMs > 0)) {
      throw new ConfigError(`pollIntervalMs는 양수여야 합니다 (현재 ${this.pollIntervalMs})`);
    }
  }

  /**
   * 평가 루프 시작
   *
   * @throws ConnectionError 저장소 연결 확인 실패 (루프는 STOPPED)
   */
  async start(): Promise<void> {
    if (this.state !== 'IDLE') return;

    try {
      await this.store.verifyConnection();
    } catch (error) {
      const fatal = new ConnectionError(`트랙 저장소 연결 실패: ${describeError(error)}`, {
        cause: error,
      });
      this.state = 'STOPPED';
      this.errorLogger.log(fatal);
      throw fatal;
    }

    this.state = 'RUNNING';
    await this.logger.startSession({
      poll_interval_ms: this.pollIntervalMs,
      dead_band_threshold: this.deadBandThreshold,
      escalation_threshold: this.escalationThreshold,
      speed_ceiling: this.scoring.speedCeiling,
      inner_radius: this.scoring.innerRadius,
      outer_radius: this.scoring.outerRadius,
      weights: { ...this.scoring.weights },
      protected_point: { ...this.scoring.protectedPoint },
    });

    console.log('[Evaluator] 위협 평가기 가동');
    this.scheduleNext(0);
  }

  /**
   * 평가 루프 정지 (진행 중인 사이클은 완료될 때까지 대기)
   */
  async stop(): Promise<void> {
    if (this.state === 'STOPPED') {
      // 치명적 정지(halt)가 세션을 마무리하는 중일 수 있음
      if (this.inFlight) {
        await this.inFlight;
      }
      return;
    }

    const wasRunning = this.state === 'RUNNING';
    this.state = 'STOPPED';
    this.cancelPending();

    if (this.inFlight) {
      await this.inFlight;
    }

    if (wasRunning) {
      await this.logger.endSession('shutdown', this.toSummary());
      this.errorLogger.printStats();
      console.log('[Evaluator] 위협 평가기 정지');
    }
  }

  getState(): EvaluatorState {
    return this.state;
  }

  getStats(): EvaluatorStats {
    return { ...this.stats };
  }

  // ============================================
  // 사이클
  // ============================================

  /**
   * 평가 사이클 1회 실행
   *
   * @throws ConnectionError 세션을 획득할 수 없는 경우
   */
  async runCycle(): Promise<CycleReport> {
    const cycle = ++this.cycleCount;
    const startedAt = Date.now();
    const report: CycleReport = {
      cycle,
      fetched: 0,
      evaluated: 0,
      skipped: 0,
      scoreWrites: 0,
      engagements: 0,
      dataErrors: 0,
      persistErrors: 0,
      fetchFailed: false,
      committed: false,
      durationMs: 0,
    };

    let session: ITrackStoreSession;
    try {
      session = await this.store.openSession();
    } catch (error) {
      throw new ConnectionError(`저장소 세션 획득 실패: ${describeError(error)}`, { cause: error });
    }

    try {
      let records: TrackRecord[];
      try {
        records = await session.fetchLiveTracks();
      } catch (error) {
        report.fetchFailed = true;
        this.recordCycleFailure(
          new FetchError(`LIVE 트랙 조회 실패: ${describeError(error)}`, { cause: error }),
          cycle
        );
        await this.rollbackQuietly(session, report);
        return this.finishReport(report, startedAt);
      }

      report.fetched = records.length;
      for (const record of records) {
        await this.evaluateRecord(session, record, report);
      }

      try {
        await session.commit();
        report.committed = true;
      } catch (error) {
        this.recordPersistFailure(
          new PersistError(`사이클 commit 실패: ${describeError(error)}`, { cause: error }),
          report,
          null,
          'commit'
        );
        await this.rollbackQuietly(session, report);
      }
    } finally {
      await session.release();
    }

    return this.finishReport(report, startedAt);
  }

  /**
   * 트랙 1개 평가: 검증 → 점수 → 데드밴드 → 교전 정책
   */
  private async evaluateRecord(
    session: ITrackStoreSession,
    record: TrackRecord,
    report: CycleReport
  ): Promise<void> {
    let track: Track;
    let breakdown: ThreatScoreBreakdown;
    try {
      track = validateTrack(record);
      breakdown = computeThreatScoreBreakdown(track, this.scoring);
    } catch (error) {
      const dataError =
        error instanceof DataError ? error : new DataError(describeError(error), { cause: error });
      report.dataErrors++;
      this.errorLogger.log(dataError, record.id);
      this.logger.log({
        timestamp: Date.now(),
        event: 'track_rejected',
        cycle: report.cycle,
        track_id: record.id,
        reason: dataError.message,
      });
      return;
    }

    if (track.lifecycleState !== 'LIVE') {
      report.skipped++;
      return;
    }
    report.evaluated++;

    const score = breakdown.total;

    if (shouldPersistScore(score, track.threatScore, this.deadBandThreshold)) {
      console.log(
        `[Evaluator] ${track.externalRef}: 속도 ${track.speed} 거리 ${Math.trunc(breakdown.distance)} -> 점수 ${score}`
      );
      try {
        await session.persistScore(track.id, score);
        report.scoreWrites++;
        this.logger.log({
          timestamp: Date.now(),
          event: 'score_update',
          cycle: report.cycle,
          track_id: track.id,
          external_ref: track.externalRef,
          previous_score: track.threatScore,
          score,
          speed: track.speed,
          distance: breakdown.distance,
          risks: {
            speed: breakdown.speedRisk,
            proximity: breakdown.proximityRisk,
            identification: breakdown.identificationRisk,
          },
        });
      } catch (error) {
        this.recordPersistFailure(
          new PersistError(`점수 저장 실패: ${describeError(error)}`, { cause: error }),
          report,
          track.id,
          'score'
        );
      }
    }

    // 데드밴드와 독립적으로 새 점수로 판단
    const decision = decideEscalation(score, track.lifecycleState, this.escalationThreshold);
    if (decision.transition !== 'ENGAGE') return;

    console.warn(
      `[Evaluator] !!! 자동 교전: ${track.externalRef} (점수 ${score} > ${decision.threshold}) !!!`
    );
    try {
      await session.persistStatus(track.id, decision.to);
      report.engagements++;
      this.logger.log({
        timestamp: Date.now(),
        event: 'track_engaged',
        cycle: report.cycle,
        track_id: track.id,
        external_ref: track.externalRef,
        score,
        threshold: decision.threshold,
        identification: track.identification,
      });
    } catch (error) {
      this.recordPersistFailure(
        new PersistError(`교전 상태 저장 실패: ${describeError(error)}`, { cause: error }),
        report,
        track.id,
        'status'
      );
    }
  }

  // ============================================
  // 에러 기록
  // ============================================

  private recordCycleFailure(error: EvaluatorError, cycle: number): void {
    this.errorLogger.log(error);
    this.logger.log({
      timestamp: Date.now(),
      event: 'cycle_failed',
      cycle,
      code: error.code,
      message: error.message,
    });
  }

  private recordPersistFailure(
    error: PersistError,
    report: CycleReport,
    trackId: string | null,
    operation: PersistFailedEvent['operation']
  ): void {
    report.persistErrors++;
    this.errorLogger.log(error, trackId ?? undefined);
    this.logger.log({
      timestamp: Date.now(),
      event: 'persist_failed',
      cycle: report.cycle,
      track_id: trackId,
      operation,
      message: error.message,
    });
  }

  private async rollbackQuietly(session: ITrackStoreSession, report: CycleReport): Promise<void> {
    try {
      await session.rollback();
    } catch (error) {
      this.recordPersistFailure(
        new PersistError(`롤백 실패: ${describeError(error)}`, { cause: error }),
        report,
        null,
        'commit'
      );
    }
  }

  private finishReport(report: CycleReport, startedAt: number): CycleReport {
    report.durationMs = Date.now() - startedAt;

    this.stats.cycles++;
    this.stats.tracksEvaluated += report.evaluated;
    this.stats.dataErrors += report.dataErrors;
    this.stats.persistErrors += report.persistErrors;
    if (report.fetchFailed) {
      this.stats.fetchFailures++;
    }
    // commit되지 않은 쓰기는 반영되지 않음
    if (report.committed) {
      this.stats.scoreWrites += report.scoreWrites;
      this.stats.engagements += report.engagements;
    }

    return report;
  }

  // ============================================
  // 스케줄링
  // ============================================

  private scheduleNext(delayMs: number): void {
    this.pending = this.scheduler.schedule(() => {
      const tick = this.tick();
      this.inFlight = tick;
      return tick;
    }, delayMs);
  }

  /**
   * 사이클 1회 + 다음 사이클 예약. 예외를 밖으로 전파하지 않음
   */
  private async tick(): Promise<void> {
    this.pending = null;
    if (this.state !== 'RUNNING') return;

    try {
      await this.runCycle();
    } catch (error) {
      const evaluatorError = toEvaluatorError(error);
      if (isFatalError(evaluatorError)) {
        await this.halt(evaluatorError);
        return;
      }
      this.errorLogger.log(evaluatorError);
    } finally {
      this.inFlight = null;
    }

    if (this.state === 'RUNNING') {
      this.scheduleNext(this.pollIntervalMs);
    }
  }

  /**
   * 치명적 에러로 루프 정지
   */
  private async halt(error: EvaluatorError): Promise<void> {
    this.state = 'STOPPED';
    this.cancelPending();
    this.errorLogger.log(error);
    console.error('[Evaluator] 치명적 오류로 평가 루프 정지:', error.message);

    await this.logger.endSession('fatal', this.toSummary());
    this.errorLogger.printStats();
    this.onFatal?.(error);
  }

  private cancelPending(): void {
    if (this.pending) {
      this.pending.cancel();
      this.pending = null;
    }
  }

  private toSummary(): Partial<EvaluatorSummary> {
    return {
      cycles: this.stats.cycles,
      tracks_evaluated: this.stats.tracksEvaluated,
    };
  }
}
