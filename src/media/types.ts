import type { MediaRole } from '../pipeline/types.js';

export interface MuxInput {
  path: string;
  role: MediaRole;
  language?: string | null;
}

/**
 * Container/codec tool used for the embed-subtitle and mux steps. Each call
 * is one scoped external process; a non-zero exit rejects with MuxError.
 */
export interface MediaMuxer {
  /** Combine streams into one container without re-encoding. */
  mux(inputs: MuxInput[], outputPath: string, signal?: AbortSignal): Promise<void>;
  /** Convert a subtitle file to SubRip for use as a soft track. */
  convertSubtitle(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
  /** Render subtitles into the video pixels (re-encodes the video). */
  burnSubtitle(videoPath: string, subtitlePath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
}
