import type { Logger } from '@trading-analytics/shared-utils';

export type Job = () => Promise<unknown>;

export interface JobScheduler {
  /** 같은 이름의 이전 실행이 끝나지 않았으면 건너뛴다 */
  run(name: string, job: Job): Promise<void>;
  every(name: string, intervalMs: number, job: Job): void;
  stop(): void;
}

/**
 * 주기 작업 실행기
 * - 작업 예외는 로그로 남기고 다음 주기에 다시 실행
 */
export function createJobScheduler(logger: Logger): JobScheduler {
  const running = new Set<string>();
  const timers: NodeJS.Timeout[] = [];

  const run = async (name: string, job: Job): Promise<void> => {
    if (running.has(name)) {
      logger.warn('이전 실행이 진행 중이라 스킵', { job: name });
      return;
    }

    running.add(name);
    const startedAt = Date.now();
    try {
      const result = await job();
      logger.info('작업 완료', { job: name, elapsedMs: Date.now() - startedAt, result });
    } catch (error: unknown) {
      logger.error(`작업 실패: ${name}`, error);
    } finally {
      running.delete(name);
    }
  };

  return {
    run,

    every(name: string, intervalMs: number, job: Job): void {
      logger.info('작업 스케줄 등록', { job: name, intervalMs });
      timers.push(
        setInterval(() => {
          void run(name, job);
        }, intervalMs),
      );
    },

    stop(): void {
      for (const timer of timers) clearInterval(timer);
      timers.length = 0;
    },
  };
}
