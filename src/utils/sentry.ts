import * as Sentry from '@sentry/node';

// Only enabled when a DSN is provided
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    sampleRate: 1.0,
    tracesSampleRate: 0,
    serverName: process.env.HOSTNAME || 'storefront-snapshot-local',
  });
}

// Manual error capture helper
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope((scope) => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error instanceof Error ? error : new Error(String(error)));
  });
}

/**
 * Monitor configuration for the scheduled snapshot job
 */
export interface CronMonitorConfig {
  /** Unique identifier for this monitor (slug format) */
  monitorSlug: string;
  /** Cron schedule expression (e.g., '0 3 * * *') */
  schedule: string;
  timezone: string;
  /** Maximum expected runtime in minutes */
  maxRuntimeMinutes?: number;
  /** Grace period in minutes before alerting on missed check-in */
  checkinMarginMinutes?: number;
}

/**
 * Wrapper to execute a job with Sentry cron check-ins
 * Marks the job in_progress, then ok or error depending on the outcome
 */
export async function withCronMonitoring<T>(
  monitor: CronMonitorConfig,
  jobFn: () => Promise<T>
): Promise<T> {
  if (!sentryEnabled) {
    return jobFn();
  }

  const checkInId = Sentry.captureCheckIn(
    { monitorSlug: monitor.monitorSlug, status: 'in_progress' },
    {
      schedule: { type: 'crontab', value: monitor.schedule },
      timezone: monitor.timezone,
      checkinMargin: monitor.checkinMarginMinutes,
      maxRuntime: monitor.maxRuntimeMinutes,
    }
  );

  try {
    const result = await jobFn();
    Sentry.captureCheckIn({ checkInId, monitorSlug: monitor.monitorSlug, status: 'ok' });
    return result;
  } catch (error) {
    Sentry.captureCheckIn({ checkInId, monitorSlug: monitor.monitorSlug, status: 'error' });
    captureError(error, { monitorSlug: monitor.monitorSlug });
    throw error;
  }
}
