/**
 * Shared pipeline types: selection decisions, assembly plans, advisories and
 * the run observer used for progress reporting.
 */
import type { OutputFormat, SubtitleMode } from '../config.js';
import type { AudioStream, StreamSource, SubtitleTrack, VideoStream } from '../catalog/model.js';

// ── Selection ─────────────────────────────────────────────────────────────────

export type MatchBasis = 'exact' | 'base';

/** `language` is always the normalized preference the decision was made for. */
export type SelectionDecision =
  | { kind: 'audio-match'; language: string; audioStream: AudioStream; basis: MatchBasis | 'title' }
  | { kind: 'subtitle-fallback'; language: string; subtitleTrack: SubtitleTrack; basis: MatchBasis }
  | { kind: 'no-match'; language: string };

// ── Plan ──────────────────────────────────────────────────────────────────────

export type StepKind = 'fetch' | 'embed-subtitle' | 'mux';
export type MediaRole = 'video' | 'audio' | 'subtitle';

/** A named file inside the run's work area, written by exactly one step. */
export interface SlotRef {
  slot: string;
  fileName: string;
}

export interface StepInput extends SlotRef {
  role: MediaRole;
  /** Language tag written into the container's stream metadata */
  language?: string | null;
}

export interface FetchStep {
  kind: 'fetch';
  role: MediaRole;
  streamRef: string;
  source?: StreamSource;
  inputs: readonly StepInput[];
  output: SlotRef;
}

export interface EmbedSubtitleStep {
  kind: 'embed-subtitle';
  mode: SubtitleMode;
  language: string;
  /** soft: [subtitle]; burned-in: [video, subtitle] */
  inputs: readonly StepInput[];
  output: SlotRef;
}

export interface MuxStep {
  kind: 'mux';
  inputs: readonly StepInput[];
  output: SlotRef;
}

export type AssemblyStep = FetchStep | EmbedSubtitleStep | MuxStep;

export interface AssemblyPlan {
  readonly mediaId: string;
  readonly title: string | null;
  readonly language: string;
  readonly decision: SelectionDecision;
  readonly video: VideoStream;
  readonly container: OutputFormat;
  readonly steps: readonly AssemblyStep[];
  /** Slot holding the finished file; always the last step's output */
  readonly output: SlotRef;
}

// ── Advisories ────────────────────────────────────────────────────────────────

export type Advisory =
  | { kind: 'quality-downgraded'; requested: string; selected: string }
  | { kind: 'original-audio-fallback'; language: string; audioStreamRef: string }
  | { kind: 'language-inferred-from-title'; language: string; audioStreamRef: string };

export interface PlanResult {
  plan: AssemblyPlan;
  advisories: Advisory[];
}

// ── Observation ───────────────────────────────────────────────────────────────

export interface ProgressEvent {
  step: StepKind;
  stepIndex: number;
  slot: string;
  bytesDone: number;
  /** null when the server does not announce a length */
  bytesTotal: number | null;
}

export interface RunObserver {
  onProgress?: (event: ProgressEvent) => void;
  onAdvisory?: (advisory: Advisory) => void;
  onStepStart?: (step: AssemblyStep, stepIndex: number) => void;
}
