/**
 * 위협 평가기
 * 진입점
 */

import { getConfig, EvaluatorConfig } from './config';
import { AdapterFactory } from './adapters/AdapterFactory';
import { ITrackStore } from './adapters/ITrackStore';
import { ThreatEvaluator } from './core/evaluation';
import { getLogger } from './core/logging/logger';
import { describeError } from './core/errors/errorHandler';

console.log('========================================');
console.log('  위협 평가기');
console.log('  Threat Evaluation Engine');
console.log('========================================');

async function closeStore(store: ITrackStore): Promise<void> {
  try {
    await store.close();
  } catch (error) {
    console.error('[Evaluator] 저장소 종료 실패:', describeError(error));
  }
}

async function main(): Promise<void> {
  let config: EvaluatorConfig;
  let store: ITrackStore;
  try {
    config = getConfig();
    store = AdapterFactory.createTrackStore(config.storeDriver, {
      databaseUrl: config.databaseUrl,
    });
  } catch (error) {
    console.error('[Evaluator] 설정 오류:', describeError(error));
    process.exit(1);
  }

  const evaluator = new ThreatEvaluator({
    store,
    scoring: config.scoring,
    deadBandThreshold: config.deadBandThreshold,
    escalationThreshold: config.escalationThreshold,
    pollIntervalMs: config.pollIntervalMs,
    logger: getLogger({
      logsDir: config.logsDir,
      enabled: config.logEnabled,
      consoleOutput: config.logConsoleOutput,
    }),
    onFatal: () => {
      void closeStore(store).then(() => process.exit(1));
    },
  });

  const shutdown = async (): Promise<void> => {
    console.log('\n[Evaluator] 종료 중...');
    await evaluator.stop();
    await closeStore(store);
    process.exit(0);
  };

  // 종료 시그널 처리
  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      console.error('[Evaluator] 종료 실패:', describeError(error));
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      console.error('[Evaluator] 종료 실패:', describeError(error));
      process.exit(1);
    });
  });

  try {
    await evaluator.start();
  } catch (error) {
    console.error('[Evaluator] 기동 실패:', describeError(error));
    await closeStore(store);
    process.exit(1);
  }

  console.log(`[Evaluator] ${config.pollIntervalMs}ms 주기로 LIVE 트랙 평가 중`);
}

main().catch((error: unknown) => {
  console.error('[Evaluator] 예기치 않은 오류:', describeError(error));
  process.exit(1);
});
