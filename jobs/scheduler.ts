// jobs/scheduler.ts
import logger from '../utils/logger';
import { CONSTANTS } from '../utils/constants';
import { RunInProgressError, describeError } from '../utils/errors';
import queueManager from './queueManager';
import { startWorker, shutdownWorker } from './worker';
import type { BullMQConnection } from '../utils/config';
import type { IRunSummary, RunTrigger } from '../types';

export interface DailySchedule {
  hour: number;
  minute: number;
  timeZone: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Milliseconds from `now` until the next HH:MM wall-clock time in the schedule's zone.
 * A time equal to `now` counts as tomorrow.
 */
export const msUntilNextRun = (schedule: DailySchedule, now: Date): number => {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: schedule.timeZone,
    hourCycle: 'h23',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find(p => p.type === type)?.value ?? 0);

  const elapsedToday = ((pick('hour') * 60 + pick('minute')) * 60 + pick('second')) * 1000 + now.getMilliseconds();
  const target = (schedule.hour * 60 + schedule.minute) * 60 * 1000;

  const delta = target - elapsedToday;
  return delta > 0 ? delta : delta + DAY_MS;
};

export const toCronPattern = ({ hour, minute }: DailySchedule): string => `${minute} ${hour} * * *`;

/** Fires the handler once a day. */
export interface Ticker {
  name: string;
  start(handler: () => Promise<void>): Promise<void>;
  stop(): Promise<void>;
}

/**
 * In-process timer; re-arms after every firing so drift never accumulates.
 */
export class TimerTicker implements Ticker {
  name = 'timer';
  private timer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(private readonly schedule: DailySchedule, private readonly clock: () => Date = () => new Date()) {}

  async start(handler: () => Promise<void>): Promise<void> {
    this.stopped = false;
    this.arm(handler);
  }

  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private arm(handler: () => Promise<void>): void {
    if (this.stopped) return;
    const delay = msUntilNextRun(this.schedule, this.clock());
    logger.info(`⏰ Next scheduled run in ${Math.round(delay / 60000)} min`);

    this.timer = setTimeout(() => {
      handler()
        .catch((err: unknown) => logger.error(`Scheduled handler failed: ${describeError(err)}`))
        .finally(() => this.arm(handler));
    }, delay);
  }
}

/**
 * BullMQ repeatable job; only one worker across all instances picks up each firing.
 */
export class QueueTicker implements Ticker {
  name = 'queue';

  constructor(private readonly schedule: DailySchedule, private readonly connection: BullMQConnection) {}

  async start(handler: () => Promise<void>): Promise<void> {
    const ready = await queueManager.initialize(this.connection);
    if (!ready) throw new Error('Queue could not be initialized');

    await queueManager.scheduleRepeatableJob(
      CONSTANTS.QUEUE.DAILY_JOB,
      toCronPattern(this.schedule),
      this.schedule.timeZone,
      { trigger: 'scheduled' }
    );
    startWorker(this.connection, handler);
  }

  async stop(): Promise<void> {
    await shutdownWorker();
    await queueManager.shutdown();
  }
}

export interface SchedulerTarget {
  runOnce(trigger: RunTrigger): Promise<IRunSummary>;
}

/**
 * Wires the daily trigger to the orchestrator. A firing that lands on an
 * active run is skipped, not queued.
 */
export const startScheduler = async (orchestrator: SchedulerTarget, ticker: Ticker): Promise<Ticker> => {
  logger.info(`⏰ Initializing Scheduler (${ticker.name})...`);

  const handler = async () => {
    try {
      await orchestrator.runOnce('scheduled');
    } catch (err) {
      if (err instanceof RunInProgressError) {
        logger.warn(`⏭️ Scheduled run skipped: ${err.message}`);
        return;
      }
      throw err;
    }
  };

  await ticker.start(handler);
  return ticker;
};

export const createTicker = (schedule: DailySchedule, connection: BullMQConnection | undefined): Ticker =>
  connection ? new QueueTicker(schedule, connection) : new TimerTicker(schedule);
