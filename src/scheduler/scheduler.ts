import * as cron from 'node-cron';
import { logger } from '../utils/logger.js';
import { captureError, withCronMonitoring } from '../utils/sentry.js';

/**
 * Job scheduler for recurring snapshot runs
 *
 * Cron schedule format:
 * ┌────────────── second (optional, 0-59)
 * │ ┌──────────── minute (0-59)
 * │ │ ┌────────── hour (0-23)
 * │ │ │ ┌──────── day of month (1-31)
 * │ │ │ │ ┌────── month (1-12)
 * │ │ │ │ │ ┌──── day of week (0-7, 0 and 7 are Sunday)
 * │ │ │ │ │ │
 * * * * * * *
 */

export type JobTrigger = 'scheduled' | 'manual';

export interface SchedulerConfig {
  /** Cron expression for schedule (default: '0 3 * * *' = 3 AM daily) */
  schedule?: string;
  timezone?: string;
  /** Run immediately on startup */
  runOnStart?: boolean;
  /** Sentry cron monitor slug */
  monitorSlug?: string;
}

export class JobScheduler {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;
  private config: Required<SchedulerConfig>;

  constructor(
    private readonly job: () => Promise<void>,
    config: SchedulerConfig = {}
  ) {
    this.config = {
      schedule: config.schedule || '0 3 * * *',
      timezone: config.timezone || 'Africa/Cairo',
      runOnStart: config.runOnStart ?? false,
      monitorSlug: config.monitorSlug || 'storefront-snapshot',
    };
  }

  /**
   * Start the scheduler
   */
  async start(): Promise<void> {
    if (this.task) {
      logger.warn('Scheduler is already running');
      return;
    }

    if (!cron.validate(this.config.schedule)) {
      throw new Error(`Invalid cron expression: ${this.config.schedule}`);
    }

    this.task = cron.schedule(
      this.config.schedule,
      () => {
        if (this.isRunning) {
          logger.warn('Previous job still running, skipping this execution');
          return;
        }

        this.executeJob('scheduled').catch((error: unknown) => {
          captureError(error, { trigger: 'scheduled' });
        });
      },
      { timezone: this.config.timezone }
    );

    logger.info('Job scheduler started', {
      schedule: this.config.schedule,
      timezone: this.config.timezone,
      runOnStart: this.config.runOnStart,
    });

    if (this.config.runOnStart) {
      logger.info('Running job immediately on startup');
      await this.runNow();
    }
  }

  /**
   * Stop the scheduler
   */
  stop(): void {
    if (this.task) {
      logger.info('Stopping job scheduler');
      this.task.stop();
      this.task = null;
    }
  }

  /**
   * Run the job immediately (outside of schedule)
   */
  async runNow(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Job is already running');
      return;
    }

    await this.executeJob('manual');
  }

  private async executeJob(trigger: JobTrigger): Promise<void> {
    try {
      this.isRunning = true;
      logger.info(`Job execution triggered (${trigger})`);

      await withCronMonitoring(
        {
          monitorSlug: this.config.monitorSlug,
          schedule: this.config.schedule,
          timezone: this.config.timezone,
          maxRuntimeMinutes: 180,
          checkinMarginMinutes: 10,
        },
        this.job
      );

      logger.info(`Job completed successfully (${trigger})`);
    } catch (error) {
      logger.error(`Job failed (${trigger})`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.isRunning = false;
    }
  }

  isSchedulerRunning(): boolean {
    return this.task !== null;
  }

  isJobRunning(): boolean {
    return this.isRunning;
  }

  getConfig(): Required<SchedulerConfig> {
    return { ...this.config };
  }
}
