/**
 * JSONL 로거 시스템
 *
 * 평가기 이벤트를 JSONL 형식으로 파일에 저장합니다.
 * 파일명: /logs/evaluator_{timestamp}.jsonl
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  EvaluatorStartEvent,
  EvaluatorStopEvent,
  EvaluatorSummary,
  LogEvent,
} from './eventSchemas';

export interface LoggerConfig {
  logsDir: string;
  enabled: boolean;
  consoleOutput: boolean;  // 콘솔에도 출력할지 여부
  customFilename?: string;  // 커스텀 파일명 (선택사항)
}

const DEFAULT_CONFIG: LoggerConfig = {
  logsDir: './logs',
  enabled: true,
  consoleOutput: false,
  customFilename: undefined,
};

/** 이벤트 기반 통계 */
export interface EventStats {
  score_updates: number;
  engagements: number;
  rejected_tracks: number;
  failed_cycles: number;
  persist_failures: number;
}

function emptyStats(): EventStats {
  return {
    score_updates: 0,
    engagements: 0,
    rejected_tracks: 0,
    failed_cycles: 0,
    persist_failures: 0,
  };
}

export class EvaluatorLogger {
  private config: LoggerConfig;
  private currentFile: string | null = null;
  private writeStream: fs.WriteStream | null = null;
  private sessionActive: boolean = false;
  private eventCount: number = 0;
  private stats: EventStats = emptyStats();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * 로그 디렉토리 확인/생성
   */
  private ensureLogsDir(): void {
    if (!fs.existsSync(this.config.logsDir)) {
      fs.mkdirSync(this.config.logsDir, { recursive: true });
    }
  }

  /**
   * 새 세션 시작
   */
  async startSession(config: EvaluatorStartEvent['config']): Promise<void> {
    // 이전 세션 종료
    if (this.sessionActive) {
      await this.endSession('shutdown');
    }

    this.sessionActive = true;
    this.eventCount = 0;
    this.stats = emptyStats();

    if (this.config.enabled) {
      this.ensureLogsDir();
      let filename: string;
      if (this.config.customFilename) {
        filename = this.config.customFilename;
      } else {
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
        filename = `evaluator_${timestamp}.jsonl`;
      }
      this.currentFile = path.join(this.config.logsDir, filename);
      this.writeStream = fs.createWriteStream(this.currentFile, { flags: 'a' });
      this.writeStream.on('error', (error) => {
        console.error(`[Logger] 로그 파일 쓰기 실패: ${error.message}`);
      });
      console.log(`[Logger] 로그 파일 생성: ${this.currentFile}`);
    }

    this.log({
      timestamp: Date.now(),
      event: 'evaluator_start',
      config,
    });
  }

  /**
   * 세션 종료 (파일 flush 완료 시 resolve)
   */
  async endSession(
    reason: EvaluatorStopEvent['reason'],
    summary?: Partial<EvaluatorSummary>
  ): Promise<void> {
    if (!this.sessionActive) return;

    this.log({
      timestamp: Date.now(),
      event: 'evaluator_stop',
      reason,
      summary: {
        cycles: 0,
        tracks_evaluated: 0,
        ...summary,
        score_updates: this.stats.score_updates,
        engagements: this.stats.engagements,
        rejected_tracks: this.stats.rejected_tracks,
        failed_cycles: this.stats.failed_cycles,
        persist_failures: this.stats.persist_failures,
      },
    });

    this.sessionActive = false;

    const stream = this.writeStream;
    this.writeStream = null;
    if (stream) {
      await new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
      console.log(`[Logger] 로그 저장 완료: ${this.eventCount}개 이벤트, ${this.currentFile}`);
    }
    this.currentFile = null;
  }

  /**
   * 이벤트 로깅
   */
  log(event: LogEvent): void {
    // 통계는 파일 출력 여부와 무관하게 유지
    this.updateStats(event);

    if (!this.config.enabled) return;

    // JSONL 형식으로 기록
    const line = JSON.stringify(event) + '\n';

    if (this.writeStream) {
      this.writeStream.write(line);
      this.eventCount++;
    }

    if (this.config.consoleOutput) {
      console.log(`[Log] ${event.event}:`, JSON.stringify(event).substring(0, 100));
    }
  }

  /**
   * 통계 업데이트
   */
  private updateStats(event: LogEvent): void {
    switch (event.event) {
      case 'score_update':
        this.stats.score_updates++;
        break;
      case 'track_engaged':
        this.stats.engagements++;
        break;
      case 'track_rejected':
        this.stats.rejected_tracks++;
        break;
      case 'cycle_failed':
        this.stats.failed_cycles++;
        break;
      case 'persist_failed':
        this.stats.persist_failures++;
        break;
    }
  }

  /**
   * 현재 통계 반환
   */
  getStats(): EventStats {
    return { ...this.stats };
  }

  /**
   * 로거 활성화/비활성화
   */
  setEnabled(enabled: boolean): void {
    this.config.enabled = enabled;
  }

  /**
   * 현재 로그 파일 경로 반환
   */
  getCurrentLogFile(): string | null {
    return this.currentFile;
  }
}

// 싱글톤 인스턴스
let loggerInstance: EvaluatorLogger | null = null;

export function getLogger(config?: Partial<LoggerConfig>): EvaluatorLogger {
  if (!loggerInstance) {
    loggerInstance = new EvaluatorLogger(config);
  }
  return loggerInstance;
}

export async function resetLogger(): Promise<void> {
  if (loggerInstance) {
    await loggerInstance.endSession('shutdown');
  }
  loggerInstance = null;
}
