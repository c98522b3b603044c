/**
 * Assembly planner: turns a selection decision and a requested quality into
 * the complete, ordered list of steps the executor will run.
 *
 * Pure: the same inputs always produce a structurally identical plan. Plans are
 * fully materialized and frozen before anything executes, so they can be
 * logged and inspected up front.
 *
 *   audio-match        fetch video → fetch audio → mux
 *   subtitle-fallback  fetch video → fetch original audio → fetch subtitle
 *                      → embed subtitle (soft | burned-in) → mux
 *   no-match           fetch video → fetch default audio → mux  (opt-in only)
 */
import type { OutputFormat, SubtitleMode } from '../config.js';
import { defaultAudioStream, type AudioStream, type RenditionCatalog, type SubtitleTrack, type VideoStream } from '../catalog/model.js';
import { PlanError } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import type {
  Advisory,
  AssemblyPlan,
  AssemblyStep,
  FetchStep,
  PlanResult,
  SelectionDecision,
  SlotRef,
  StepInput,
} from './types.js';

export interface PlanOptions {
  allowFallbackToOriginal: boolean;
  subtitleMode: SubtitleMode;
  outputFormat: OutputFormat;
}

// ── Quality selection ─────────────────────────────────────────────────────────

/** "720" and "720P" both mean "720p". */
export function normalizeQualityLabel(label: string): string {
  const trimmed = label.trim().toLowerCase();
  return /^\d+$/.test(trimmed) ? `${trimmed}p` : trimmed;
}

function parseQualityHeight(label: string): number | null {
  const match = label.match(/(\d+)/);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/** Earliest stream among those sharing the extreme height picked by `better`. */
function pickByHeight(
  streams: readonly VideoStream[],
  better: (candidate: number, current: number) => boolean,
): VideoStream | undefined {
  let chosen: VideoStream | undefined;
  for (const stream of streams) {
    if (!chosen || better(stream.height, chosen.height)) chosen = stream;
  }
  return chosen;
}

export interface QualitySelection {
  video: VideoStream;
  advisory?: Advisory;
}

/**
 * Exact label match first; otherwise the nearest quality strictly below the
 * request; otherwise the lowest available. Any substitution is reported as a
 * quality-downgraded advisory. A missing request (or "best") takes the highest.
 */
export function selectVideoStream(
  streams: readonly VideoStream[],
  requestedQuality: string | undefined,
): QualitySelection {
  const highest = pickByHeight(streams, (a, b) => a > b);
  if (!highest) throw new PlanError('NO_VIDEO_STREAM', 'The catalog offers no video stream');

  if (!requestedQuality || normalizeQualityLabel(requestedQuality) === 'best') {
    return { video: highest };
  }

  const wanted = normalizeQualityLabel(requestedQuality);
  const exact = streams.find((s) => normalizeQualityLabel(s.qualityLabel) === wanted);
  if (exact) return { video: exact };

  const wantedHeight = parseQualityHeight(wanted);
  if (wantedHeight === null) {
    throw new PlanError('INVALID_QUALITY', `Unrecognized quality "${requestedQuality}" (expected e.g. "720p")`);
  }

  const below = streams.filter((s) => s.height < wantedHeight);
  const video = pickByHeight(below, (a, b) => a > b)
    ?? pickByHeight(streams, (a, b) => a < b)
    ?? highest;

  return {
    video,
    advisory: { kind: 'quality-downgraded', requested: requestedQuality, selected: video.qualityLabel },
  };
}

// ── Step builders ─────────────────────────────────────────────────────────────

function slot(name: string, extension: string): SlotRef {
  return { slot: name, fileName: `${name}.${extension}` };
}

function fetchStep(
  role: FetchStep['role'],
  stream: VideoStream | AudioStream | SubtitleTrack,
  output: SlotRef,
): FetchStep {
  return {
    kind: 'fetch',
    role,
    streamRef: stream.streamRef,
    ...(stream.source ? { source: stream.source } : {}),
    inputs: [],
    output,
  };
}

function input(ref: SlotRef, role: StepInput['role'], language?: string | null): StepInput {
  return { ...ref, role, ...(language !== undefined ? { language } : {}) };
}

function audioAndVideoSteps(
  video: VideoStream,
  audio: AudioStream,
  outputFormat: OutputFormat,
  audioLanguage: string | null = audio.languageTag,
): AssemblyStep[] {
  const videoSlot = slot('video', video.container);
  const audioSlot = slot('audio', audio.container);
  return [
    fetchStep('video', video, videoSlot),
    fetchStep('audio', audio, audioSlot),
    {
      kind: 'mux',
      inputs: [input(videoSlot, 'video'), input(audioSlot, 'audio', audioLanguage)],
      output: slot('output', outputFormat),
    },
  ];
}

function subtitleSteps(
  video: VideoStream,
  audio: AudioStream,
  track: SubtitleTrack,
  opts: PlanOptions,
): AssemblyStep[] {
  const videoSlot = slot('video', video.container);
  const audioSlot = slot('audio', audio.container);
  const subtitleSource = slot('subtitle-source', track.format);
  const fetches = [
    fetchStep('video', video, videoSlot),
    fetchStep('audio', audio, audioSlot),
    fetchStep('subtitle', track, subtitleSource),
  ];
  const output = slot('output', opts.outputFormat);

  if (opts.subtitleMode === 'burned-in') {
    const burned = slot('video-subtitled', opts.outputFormat);
    return [
      ...fetches,
      {
        kind: 'embed-subtitle',
        mode: 'burned-in',
        language: track.languageTag,
        inputs: [input(videoSlot, 'video'), input(subtitleSource, 'subtitle', track.languageTag)],
        output: burned,
      },
      {
        kind: 'mux',
        inputs: [input(burned, 'video'), input(audioSlot, 'audio', audio.languageTag)],
        output,
      },
    ];
  }

  const converted = slot('subtitle', 'srt');
  return [
    ...fetches,
    {
      kind: 'embed-subtitle',
      mode: 'soft',
      language: track.languageTag,
      inputs: [input(subtitleSource, 'subtitle', track.languageTag)],
      output: converted,
    },
    {
      kind: 'mux',
      inputs: [
        input(videoSlot, 'video'),
        input(audioSlot, 'audio', audio.languageTag),
        input(converted, 'subtitle', track.languageTag),
      ],
      output,
    },
  ];
}

/** Every step must own its output slot exclusively. */
function assertExclusiveSlots(steps: readonly AssemblyStep[]): void {
  const seen = new Set<string>();
  for (const step of steps) {
    if (seen.has(step.output.slot)) {
      throw new Error(`Plan writes slot "${step.output.slot}" twice`);
    }
    seen.add(step.output.slot);
  }
}

// ── Public API ────────────────────────────────────────────────────────────────

export function plan(
  catalog: RenditionCatalog,
  decision: SelectionDecision,
  requestedQuality: string | undefined,
  opts: PlanOptions,
): PlanResult {
  const advisories: Advisory[] = [];
  const quality = selectVideoStream(catalog.videoStreams, requestedQuality);
  if (quality.advisory) advisories.push(quality.advisory);

  const language = decision.language;
  let steps: AssemblyStep[];

  switch (decision.kind) {
    case 'audio-match': {
      if (decision.basis === 'title') {
        advisories.push({
          kind: 'language-inferred-from-title',
          language,
          audioStreamRef: decision.audioStream.streamRef,
        });
      }
      steps = audioAndVideoSteps(
        quality.video,
        decision.audioStream,
        opts.outputFormat,
        decision.audioStream.languageTag ?? language,
      );
      break;
    }

    case 'subtitle-fallback': {
      const audio = requireDefaultAudio(catalog);
      steps = subtitleSteps(quality.video, audio, decision.subtitleTrack, opts);
      break;
    }

    case 'no-match': {
      if (!opts.allowFallbackToOriginal) {
        throw new PlanError(
          'NO_LANGUAGE_CONTENT',
          `No "${decision.language}" audio or subtitles are available for this video. ` +
          'Enable the fallback to the original audio to download it anyway.',
        );
      }
      const audio = requireDefaultAudio(catalog);
      advisories.push({ kind: 'original-audio-fallback', language, audioStreamRef: audio.streamRef });
      steps = audioAndVideoSteps(quality.video, audio, opts.outputFormat);
      break;
    }

    default: {
      const unknown: never = decision;
      throw new Error(`Unknown selection decision: ${JSON.stringify(unknown)}`);
    }
  }

  assertExclusiveSlots(steps);
  const last = steps[steps.length - 1];
  if (!last) throw new Error('Plan has no steps');

  const result: AssemblyPlan = {
    mediaId: catalog.mediaId,
    title: catalog.title,
    language,
    decision,
    video: quality.video,
    container: opts.outputFormat,
    steps,
    output: last.output,
  };

  return { plan: deepFreeze(result), advisories };
}

function requireDefaultAudio(catalog: RenditionCatalog): AudioStream {
  const audio = defaultAudioStream(catalog);
  if (!audio) throw new PlanError('NO_AUDIO_STREAM', 'The catalog offers no audio stream');
  return audio;
}

/** One line per step, for the "plan" printout before execution. */
export function describePlan(p: AssemblyPlan): string[] {
  return p.steps.map((step, i) => {
    const n = `${i + 1}.`;
    switch (step.kind) {
      case 'fetch':
        return `${n} fetch ${step.role} ${step.streamRef} → ${step.output.fileName}`;
      case 'embed-subtitle':
        return `${n} embed ${step.mode} ${step.language} subtitles → ${step.output.fileName}`;
      case 'mux':
        return `${n} mux ${step.inputs.map((i) => i.fileName).join(' + ')} → ${step.output.fileName}`;
    }
  });
}
