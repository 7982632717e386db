import cron, { type ScheduledTask } from 'node-cron';
import type { PodcastPipeline } from './index.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../errors.js';

export interface SchedulerConfig {
  cron: string;
  timezone: string;
}

// 登録済みポッドキャストを定期的に更新する
export class Scheduler {
  private pipeline: Pick<PodcastPipeline, 'refreshAll'>;
  private config: SchedulerConfig;
  private task: ScheduledTask | null = null;
  private logger: Logger;

  constructor(pipeline: Pick<PodcastPipeline, 'refreshAll'>, config: SchedulerConfig, logger: Logger = getLogger()) {
    this.pipeline = pipeline;
    this.config = config;
    this.logger = logger;
  }

  start(): void {
    if (this.task) {
      this.logger.warn('スケジューラーは既に開始されています');
      return;
    }

    // cron式のバリデーション
    if (!cron.validate(this.config.cron)) {
      throw new Error(`無効なcron式です: ${this.config.cron}`);
    }

    this.task = cron.schedule(
      this.config.cron,
      () => {
        void this.runOnce();
      },
      {
        timezone: this.config.timezone,
        scheduled: true,
      }
    );

    this.logger.info(
      { cron: this.config.cron, timezone: this.config.timezone },
      'スケジューラーを開始しました'
    );
  }

  async runOnce(): Promise<void> {
    this.logger.info({ cron: this.config.cron }, 'スケジュールされた更新を開始');
    try {
      const results = await this.pipeline.refreshAll();
      this.logger.info({ podcasts: results.length }, 'スケジュール実行が完了しました');
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'スケジュール実行が失敗しました');
    }
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      this.logger.info('スケジューラーを停止しました');
    }
  }

  isRunning(): boolean {
    return this.task !== null;
  }
}
