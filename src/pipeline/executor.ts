/**
 * Assembly executor: runs a plan inside a private work area and publishes
 * the muxed result to the destination path.
 *
 * Steps run in plan order. Consecutive fetch steps have no dependencies on
 * each other and may run concurrently; embed-subtitle and mux wait for every
 * earlier step. Any fatal failure or cancellation removes the work area and
 * surfaces as a single AssemblyError naming the failed step. The destination
 * is only ever written by the final publish.
 */
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { AssemblyError, TransportError, describeError } from '../utils/errors.js';
import type { MediaMuxer } from '../media/types.js';
import type { Transport } from '../transport/types.js';
import { WorkArea, publishArtifact } from './work-area.js';
import type {
  AssemblyPlan,
  AssemblyStep,
  EmbedSubtitleStep,
  FetchStep,
  MediaRole,
  MuxStep,
  RunObserver,
  StepInput,
} from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ExecutorDeps {
  transport: Transport;
  muxer: MediaMuxer;
}

export interface ExecutorSettings {
  /** Parent directory for per-run work areas */
  tempDir: string;
  /** Attempts per fetch step, first attempt included */
  retryBudget: number;
  retryBaseDelayMs: number;
  parallelFetch: boolean;
}

export interface ExecuteOptions {
  destination: string;
  signal?: AbortSignal;
  observer?: RunObserver;
}

interface ScheduledStep {
  step: AssemblyStep;
  index: number;
}

interface StepContext {
  workArea: WorkArea;
  signal: AbortSignal;
  observer: RunObserver;
}

class StepFailure extends Error {
  constructor(readonly scheduled: ScheduledStep, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = 'StepFailure';
  }
}

// ── Scheduling ────────────────────────────────────────────────────────────────

/**
 * Group steps into batches that may run together: runs of consecutive fetches
 * when parallel fetching is on, every other step alone.
 */
export function scheduleSteps(steps: readonly AssemblyStep[], parallelFetch: boolean): ScheduledStep[][] {
  const batches: ScheduledStep[][] = [];
  steps.forEach((step, index) => {
    const current = batches[batches.length - 1];
    const joinable = parallelFetch
      && step.kind === 'fetch'
      && current !== undefined
      && current.every((s) => s.step.kind === 'fetch');
    if (joinable) current.push({ step, index });
    else batches.push([{ step, index }]);
  });
  return batches;
}

function isTransientTransportError(err: unknown): boolean {
  return err instanceof TransportError && err.transient;
}

function requireInput(inputs: readonly StepInput[], role: MediaRole, kind: string): StepInput {
  const found = inputs.find((i) => i.role === role);
  if (!found) throw new Error(`${kind} step has no ${role} input`);
  return found;
}

// ── Executor ──────────────────────────────────────────────────────────────────

export class AssemblyExecutor {
  constructor(
    private readonly deps: ExecutorDeps,
    private readonly settings: ExecutorSettings,
  ) {}

  async execute(plan: AssemblyPlan, options: ExecuteOptions): Promise<string> {
    const { destination, signal, observer = {} } = options;
    logger.info('Executor: starting run', { mediaId: plan.mediaId, steps: plan.steps.length, destination });

    let workArea: WorkArea;
    try {
      workArea = await WorkArea.acquire(this.settings.tempDir, plan.mediaId);
    } catch (err) {
      throw new AssemblyError({ step: 'prepare', stepIndex: null, slot: null, cause: err });
    }

    try {
      for (const batch of scheduleSteps(plan.steps, this.settings.parallelFetch)) {
        const first = batch[0];
        if (first && signal?.aborted) throw new StepFailure(first, signal.reason);
        await this.runBatch(batch, workArea, signal, observer);
      }

      try {
        await publishArtifact(workArea.pathOf(plan.output), destination);
      } catch (err) {
        throw new AssemblyError({ step: 'publish', stepIndex: null, slot: plan.output.slot, cause: err });
      }

      logger.info('Executor: run complete', { mediaId: plan.mediaId, destination });
      return destination;
    } catch (err) {
      const failure = this.toAssemblyError(err, signal);
      logger.error('Executor: run failed', { mediaId: plan.mediaId, error: failure.message });
      throw failure;
    } finally {
      await this.release(workArea);
    }
  }

  private async release(workArea: WorkArea): Promise<void> {
    try {
      await workArea.release();
    } catch (err) {
      logger.warn('Executor: could not remove work area', { dir: workArea.dir, error: describeError(err) });
    }
  }

  private toAssemblyError(err: unknown, signal: AbortSignal | undefined): AssemblyError {
    if (err instanceof AssemblyError) return err;
    if (err instanceof StepFailure) {
      const { step, index } = err.scheduled;
      return new AssemblyError({
        step: step.kind,
        stepIndex: index,
        slot: step.output.slot,
        cause: err.cause,
        cancelled: signal?.aborted ?? false,
      });
    }
    return new AssemblyError({ step: 'prepare', stepIndex: null, slot: null, cause: err });
  }

  /**
   * Run a batch to completion. The first failure aborts the batch's siblings
   * and is the one reported.
   */
  private async runBatch(
    batch: ScheduledStep[],
    workArea: WorkArea,
    signal: AbortSignal | undefined,
    observer: RunObserver,
  ): Promise<void> {
    const controller = new AbortController();
    const forward = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forward, { once: true });

    const failures: StepFailure[] = [];
    const ctx: StepContext = { workArea, signal: controller.signal, observer };
    try {
      await Promise.all(batch.map((scheduled) =>
        this.runStep(scheduled, ctx).catch((err: unknown) => {
          failures.push(new StepFailure(scheduled, err));
          controller.abort(err);
        }),
      ));
    } finally {
      signal?.removeEventListener('abort', forward);
    }

    const first = failures[0];
    if (first) throw first;
  }

  private async runStep(scheduled: ScheduledStep, ctx: StepContext): Promise<void> {
    const { step, index } = scheduled;
    ctx.observer.onStepStart?.(step, index);
    logger.info(`Executor: step ${index + 1} ${step.kind}`, { output: step.output.fileName });

    switch (step.kind) {
      case 'fetch':
        await this.runFetch(step, index, ctx);
        break;
      case 'embed-subtitle':
        await this.runEmbed(step, ctx);
        break;
      case 'mux':
        await this.runMux(step, ctx);
        break;
    }
  }

  /**
   * Transient transport failures are retried with exponential backoff. Each
   * retry is a new request; it continues from the bytes already on disk only
   * when the transport reported the resource resumable.
   */
  private async runFetch(step: FetchStep, index: number, ctx: StepContext): Promise<void> {
    const dest = ctx.workArea.pathOf(step.output);
    let resumeFrom = 0;

    const result = await withRetry(
      () => this.deps.transport.download(
        { streamRef: step.streamRef, source: step.source },
        dest,
        {
          signal: ctx.signal,
          resumeFrom,
          onProgress: (bytesDone, bytesTotal) => ctx.observer.onProgress?.({
            step: 'fetch', stepIndex: index, slot: step.output.slot, bytesDone, bytesTotal,
          }),
        },
      ),
      {
        maxAttempts: this.settings.retryBudget,
        baseDelayMs: this.settings.retryBaseDelayMs,
        isRetryable: isTransientTransportError,
        onRetry: (_attempt, err) => {
          resumeFrom = err instanceof TransportError && err.resumable ? err.bytesWritten : 0;
        },
        signal: ctx.signal,
        label: `fetch ${step.streamRef}`,
      },
    );

    logger.debug('Executor: fetched', { streamRef: step.streamRef, bytes: result.bytesWritten });
  }

  private async runEmbed(step: EmbedSubtitleStep, ctx: StepContext): Promise<void> {
    const subtitle = ctx.workArea.pathOf(requireInput(step.inputs, 'subtitle', step.kind));
    const output = ctx.workArea.pathOf(step.output);

    if (step.mode === 'burned-in') {
      const video = ctx.workArea.pathOf(requireInput(step.inputs, 'video', step.kind));
      await this.deps.muxer.burnSubtitle(video, subtitle, output, ctx.signal);
    } else {
      await this.deps.muxer.convertSubtitle(subtitle, output, ctx.signal);
    }
  }

  private async runMux(step: MuxStep, ctx: StepContext): Promise<void> {
    const inputs = step.inputs.map((i) => ({
      path: ctx.workArea.pathOf(i),
      role: i.role,
      language: i.language ?? null,
    }));
    await this.deps.muxer.mux(inputs, ctx.workArea.pathOf(step.output), ctx.signal);
  }
}
