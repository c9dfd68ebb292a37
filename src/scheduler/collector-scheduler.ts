import cron, { type ScheduledTask } from 'node-cron';
import { moduleLogger } from '../logging/logger.js';

const log = moduleLogger('scheduler');

export type ScheduledJob = () => Promise<unknown>;

/**
 * CollectorScheduler
 *
 * In-process alternative to a crontab line: runs the collection on a cron
 * expression for as long as the process lives (`ticket-pulse schedule`).
 *
 * A tick that fires while the previous run is still in flight is skipped,
 * so a slow JIRA never stacks up concurrent runs.
 *
 * @example
 * const scheduler = new CollectorScheduler('*' + '/15 * * * *', () => runCollection(deps));
 * scheduler.start();
 * process.on('SIGTERM', () => scheduler.stop());
 */
export class CollectorScheduler {
  private task: ScheduledTask | undefined;
  private running = false;

  constructor(
    readonly expression: string,
    private readonly job: ScheduledJob
  ) {}

  /**
   * Validate the expression and start ticking.
   *
   * @throws If the cron expression is invalid or the scheduler is already started
   */
  start(): void {
    if (!cron.validate(this.expression)) {
      throw new Error(`Invalid cron expression: "${this.expression}"`);
    }
    if (this.task) {
      throw new Error('Scheduler already started');
    }

    this.task = cron.schedule(this.expression, () => {
      void this.runNow();
    });
    log.info({ schedule: this.expression }, 'Scheduler started');
  }

  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = undefined;
    log.info('Scheduler stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Run the job immediately unless a run is already in flight.
   * Returns false when the run was skipped. Job errors are logged, not
   * thrown, so one failed run never stops the schedule.
   */
  async runNow(): Promise<boolean> {
    if (this.running) {
      log.warn('Previous collection still running, skipping this tick');
      return false;
    }

    this.running = true;
    const started = Date.now();
    try {
      await this.job();
      log.debug({ duration: Date.now() - started }, 'Scheduled collection finished');
    } catch (error) {
      log.error(
        { duration: Date.now() - started, err: error instanceof Error ? error.message : String(error) },
        'Scheduled collection failed'
      );
    } finally {
      this.running = false;
    }
    return true;
  }
}
