/**
 * Error taxonomy for the download pipeline.
 *
 * Fatal conditions are thrown as one of these classes; non-fatal notices
 * travel as advisories (see pipeline/types.ts) and never as errors.
 */
import type { StepKind } from '../pipeline/types.js';

/** The extraction collaborator produced inconsistent rendition data. */
export class CatalogError extends Error {
  readonly kind = 'malformed' as const;

  constructor(public readonly issues: string[]) {
    super(`Malformed rendition catalog: ${issues.join('; ')}`);
    this.name = 'CatalogError';
  }
}

/** The platform/site layer could not produce metadata for a URL. */
export class ExtractionError extends Error {
  constructor(message: string, public readonly diagnostic = '', cause?: unknown) {
    super(message, { cause });
    this.name = 'ExtractionError';
  }
}

export type PlanErrorCode = 'NO_LANGUAGE_CONTENT' | 'NO_VIDEO_STREAM' | 'NO_AUDIO_STREAM' | 'INVALID_QUALITY';

/** A selection policy could not be satisfied without the caller opting in. */
export class PlanError extends Error {
  constructor(public readonly code: PlanErrorCode, message: string) {
    super(message);
    this.name = 'PlanError';
  }
}

export interface TransportErrorDetails {
  /** Timeouts, resets, partial reads and 5xx/429 responses. */
  transient: boolean;
  status?: number;
  /** The server confirmed byte-range support for this resource. */
  resumable?: boolean;
  /** Bytes present in the destination file when the attempt stopped. */
  bytesWritten?: number;
  cause?: unknown;
}

export class TransportError extends Error {
  readonly transient: boolean;
  readonly status: number | undefined;
  readonly resumable: boolean;
  readonly bytesWritten: number;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, { cause: details.cause });
    this.name = 'TransportError';
    this.transient = details.transient;
    this.status = details.status;
    this.resumable = details.resumable ?? false;
    this.bytesWritten = details.bytesWritten ?? 0;
  }
}

/** The muxing tool exited non-zero; `diagnostic` holds the tail of its stderr. */
export class MuxError extends Error {
  constructor(
    public readonly operation: string,
    public readonly exitCode: number | null,
    public readonly diagnostic: string,
  ) {
    super(`${operation} failed (exit ${exitCode ?? 'signal'}): ${diagnostic}`);
    this.name = 'MuxError';
  }
}

/** A plan step, or the work-area setup before / publish after the steps. */
export type AssemblyStage = StepKind | 'prepare' | 'publish';

export interface AssemblyErrorDetails {
  step: AssemblyStage;
  stepIndex: number | null;
  slot: string | null;
  cause: unknown;
  cancelled?: boolean;
}

/** Single aggregated failure of an assembly run, naming the step that failed. */
export class AssemblyError extends Error {
  readonly step: AssemblyStage;
  readonly stepIndex: number | null;
  readonly slot: string | null;
  readonly cancelled: boolean;

  constructor(details: AssemblyErrorDetails) {
    const where = details.stepIndex === null
      ? details.step
      : `step ${details.stepIndex + 1} (${details.step}${details.slot ? ` → ${details.slot}` : ''})`;
    const reason = details.cancelled ? 'cancelled' : `failed: ${describeError(details.cause)}`;
    super(`Assembly ${reason} at ${where}`, { cause: details.cause });
    this.name = 'AssemblyError';
    this.step = details.step;
    this.stepIndex = details.stepIndex;
    this.slot = details.slot;
    this.cancelled = details.cancelled ?? false;
  }
}

/**
 * Whether a failure is the result of cancelling the run: a cancelled assembly,
 * or anything thrown once the run's signal has fired (extraction included).
 */
export function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  return (err instanceof AssemblyError && err.cancelled) || signal?.aborted === true;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
