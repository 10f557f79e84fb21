import type { RunSummary } from '../../domain/model/Checkpoint.js';
import type { BatchConsumer } from '../../domain/ports/BatchConsumer.js';
import type { RunContext } from '../RunContext.js';
import { RunStatus } from '../../domain/model/RunStatus.js';
import { BatchProducer } from '../../domain/services/BatchProducer.js';
import { errorMessage, isRowstreamError } from '../../domain/errors/RowstreamError.js';

/**
 * Use case: deliver the rows of the source to a consumer, batch by batch,
 * resuming from the run's checkpoint and saving one after every batch.
 *
 * Stops early, at a batch boundary, when the context carries chunk limits that
 * have been reached; the run is then `PAUSED`.
 */
export class StartRun {
  constructor(private readonly ctx: RunContext) {}

  async execute(consumer: BatchConsumer): Promise<RunSummary> {
    const ctx = this.ctx;
    if (ctx.status === RunStatus.RUNNING) {
      throw new Error(`StartRun: run '${ctx.runId}' is already running`);
    }

    await ctx.restore();
    const startedAt = Date.now();
    const resumedFrom = ctx.offset;

    if (ctx.status === RunStatus.COMPLETED) {
      ctx.logger.info('Run already completed', { runId: ctx.runId, source: ctx.sourceDescription });
      return ctx.buildSummary(resumedFrom, 0, 0, startedAt);
    }

    ctx.transitionTo(RunStatus.RUNNING);
    let rowsEmitted = 0;
    let batchesEmitted = 0;
    let completed = false;

    try {
      await ctx.source.open();
      ctx.rowBudget = ctx.source.rowCount();

      ctx.eventBus.emit({
        type: 'source:opened',
        runId: ctx.runId,
        source: ctx.sourceDescription,
        rowBudget: ctx.rowBudget,
        columns: ctx.source.columns(),
        offset: resumedFrom,
        timestamp: Date.now(),
      });
      ctx.logger.info('Run started', {
        runId: ctx.runId,
        source: ctx.sourceDescription,
        rowBudget: ctx.rowBudget,
        offset: resumedFrom,
      });

      const producer = new BatchProducer(ctx.source, ctx.batchSize);
      for await (const batch of producer.produce(ctx.offset)) {
        await consumer(batch.rows, {
          runId: ctx.runId,
          batchIndex: batch.batchIndex,
          startRow: batch.startRow,
          rowBudget: ctx.rowBudget,
          isLast: batch.isLast,
        });

        ctx.offset = batch.startRow + batch.rows.length;
        ctx.batchesEmitted++;
        ctx.chunkBatchCount++;
        rowsEmitted += batch.rows.length;
        batchesEmitted++;
        if (batch.isLast) {
          ctx.transitionTo(RunStatus.COMPLETED);
          completed = true;
        }
        await ctx.saveCheckpoint();

        ctx.eventBus.emit({
          type: 'batch:produced',
          runId: ctx.runId,
          batchIndex: batch.batchIndex,
          startRow: batch.startRow,
          rowCount: batch.rows.length,
          isLast: batch.isLast,
          timestamp: Date.now(),
        });

        if (!batch.isLast && ctx.isChunkExhausted()) {
          ctx.transitionTo(RunStatus.PAUSED);
          await ctx.saveCheckpoint();
          return ctx.buildSummary(resumedFrom, rowsEmitted, batchesEmitted, startedAt);
        }
      }

      // The source ran dry before the budget (empty source, or a short final read).
      if (!completed) {
        ctx.transitionTo(RunStatus.COMPLETED);
        await ctx.saveCheckpoint();
      }
    } catch (error) {
      await this.fail(error);
      throw error;
    }

    const summary = ctx.buildSummary(resumedFrom, rowsEmitted, batchesEmitted, startedAt);
    ctx.eventBus.emit({ type: 'run:completed', runId: ctx.runId, summary, timestamp: Date.now() });
    ctx.logger.info('Run completed', { ...summary, source: ctx.sourceDescription });
    return summary;
  }

  private async fail(error: unknown): Promise<void> {
    const ctx = this.ctx;
    ctx.status = RunStatus.FAILED;

    try {
      await ctx.saveCheckpoint();
    } catch (saveError) {
      ctx.logger.error('Failed to save the checkpoint of a failed run', {
        runId: ctx.runId,
        error: errorMessage(saveError),
      });
    }

    ctx.eventBus.emit({
      type: 'run:failed',
      runId: ctx.runId,
      error: errorMessage(error),
      code: isRowstreamError(error) ? error.code : undefined,
      offset: ctx.offset,
      timestamp: Date.now(),
    });
    ctx.logger.error('Run failed', {
      runId: ctx.runId,
      source: ctx.sourceDescription,
      offset: ctx.offset,
      ...(isRowstreamError(error) ? error.toLogContext() : { error: errorMessage(error) }),
    });
  }
}
