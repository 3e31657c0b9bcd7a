import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { ProcessEventType } from '../events/process-event-type.enum';
import type { ProcessCheckpointsPurgedEvent } from '../events/process-events';
import { isTerminalProcessState } from '../process/process-states';
import { PROCESS_MODULE_OPTIONS } from '../process.constants';
import { ProcessManager } from './process-manager.service';
import { ProcessPersister } from './process-persister.service';

export interface CheckpointCleanupOptions {
  cleanupCronExpression: string;
  enableCheckpointCleanup: boolean;
}

export interface CheckpointCleanupFailure {
  pid: string;
  error: string;
}

export interface CheckpointCleanupResult {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  processesScanned: number;
  terminatedFound: number;
  attempted: number;
  succeeded: number;
  failed: number;
  failures: CheckpointCleanupFailure[];
}

/**
 * Deletes every checkpoint of processes whose rolling checkpoint is in a
 * terminal label, on a cron schedule.
 */
@Injectable()
export class CheckpointCleanupService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CheckpointCleanupService.name);
  private job: CronJob | null = null;

  constructor(
    private readonly persister: ProcessPersister,
    private readonly manager: ProcessManager,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PROCESS_MODULE_OPTIONS)
    private readonly options: CheckpointCleanupOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableCheckpointCleanup) {
      this.logger.log('Checkpoint cleanup disabled by configuration');
      return;
    }

    this.job = new CronJob(this.options.cleanupCronExpression, () => {
      this.purgeTerminatedCheckpoints()
        .then((summary) => {
          this.logger.log(
            `Checkpoint cleanup summary: scanned=${summary.processesScanned}, terminated=${summary.terminatedFound}, attempted=${summary.attempted}, succeeded=${summary.succeeded}, failed=${summary.failed}, durationMs=${summary.durationMs}`,
          );
        })
        .catch((err: unknown) => {
          this.logger.error('Unhandled error in checkpoint cleanup', err);
        });
    });
    this.job.start();
    this.logger.log(
      `Checkpoint cleanup scheduled with expression: ${this.options.cleanupCronExpression}`,
    );
  }

  onModuleDestroy(): void {
    this.job?.stop();
    this.job = null;
  }

  async purgeTerminatedCheckpoints(): Promise<CheckpointCleanupResult> {
    const startedAt = new Date();
    const summary: CheckpointCleanupResult = {
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      processesScanned: 0,
      terminatedFound: 0,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      failures: [],
    };

    const checkpoints = await this.persister.getCheckpoints();
    const rolling = checkpoints.filter((checkpoint) => checkpoint.tag === null);

    for (const checkpoint of rolling) {
      summary.processesScanned++;
      if (
        !isTerminalProcessState(checkpoint.label) ||
        this.manager.get(checkpoint.pid) !== undefined
      ) {
        continue;
      }

      summary.terminatedFound++;
      summary.attempted++;
      try {
        await this.persister.deleteProcessCheckpoints(checkpoint.pid);
        summary.succeeded++;
      } catch (error) {
        summary.failed++;
        summary.failures.push({
          pid: checkpoint.pid,
          error: error instanceof Error ? error.message : String(error),
        });
        this.logger.error(
          `Failed to delete checkpoints of process ${checkpoint.pid}`,
          error instanceof Error ? error.stack : error,
        );
        continue;
      }

      this.eventEmitter.emit(ProcessEventType.CHECKPOINTS_PURGED, {
        pid: checkpoint.pid,
        state: checkpoint.label,
        timestamp: new Date(),
      } satisfies ProcessCheckpointsPurgedEvent);
    }

    summary.finishedAt = new Date();
    summary.durationMs =
      summary.finishedAt.getTime() - summary.startedAt.getTime();

    return summary;
  }
}
