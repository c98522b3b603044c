/**
 * FFmpeg operations: stream-copy muxing, subtitle conversion, and subtitle
 * burn-in.
 *
 * All operations reject with MuxError on non-zero FFmpeg exit. Output paths
 * are supplied by the caller, which owns their cleanup.
 */
import { extname } from 'path';
import { logger } from '../utils/logger.js';
import { MuxError } from '../utils/errors.js';
import { runProcess } from '../utils/process.js';
import type { MediaMuxer, MuxInput } from './types.js';

// ── Helpers ────────────────────────────────────────────────────────────────────

/** Subtitle codec for a soft track in the given container. */
function subtitleCodecFor(outputPath: string): string {
  return extname(outputPath).toLowerCase() === '.mkv' ? 'srt' : 'mov_text';
}

/** Escape a path for use inside an FFmpeg filter argument (subtitles=...). */
export function escapeFilterPath(p: string): string {
  return p.replace(/\\/g, '/').replace(/[:'[\],;]/g, '\\$&');
}

/**
 * Build the argument list for a stream-copy mux. Inputs are mapped in order;
 * only the first stream of each role-matching type is taken from each input.
 */
export function buildMuxArgs(inputs: MuxInput[], outputPath: string): string[] {
  const args: string[] = ['-y', '-hide_banner', '-loglevel', 'error'];
  for (const input of inputs) args.push('-i', input.path);

  const mapSpec: Record<MuxInput['role'], string> = { video: 'v', audio: 'a', subtitle: 's' };
  const perRole: Record<MuxInput['role'], number> = { video: 0, audio: 0, subtitle: 0 };
  const metadata: string[] = [];

  inputs.forEach((input, index) => {
    const spec = mapSpec[input.role];
    args.push('-map', `${index}:${spec}:0`);
    const streamIndex = perRole[input.role]++;
    if (input.language) metadata.push(`-metadata:s:${spec}:${streamIndex}`, `language=${input.language}`);
  });

  args.push('-c:v', 'copy', '-c:a', 'copy');
  if (perRole.subtitle > 0) args.push('-c:s', subtitleCodecFor(outputPath));
  args.push(...metadata);
  if (extname(outputPath).toLowerCase() === '.mp4') args.push('-movflags', '+faststart');
  args.push(outputPath);
  return args;
}

export function buildBurnArgs(videoPath: string, subtitlePath: string, outputPath: string): string[] {
  return [
    '-y', '-hide_banner', '-loglevel', 'error',
    '-i', videoPath,
    '-vf', `subtitles=${escapeFilterPath(subtitlePath)}`,
    '-map', '0:v:0',
    '-c:v', 'libx264', '-preset', 'fast', '-crf', '20',
    outputPath,
  ];
}

// ── Muxer ──────────────────────────────────────────────────────────────────────

export class FfmpegMuxer implements MediaMuxer {
  constructor(private readonly ffmpegPath: string = 'ffmpeg') {}

  private async run(args: string[], label: string, signal?: AbortSignal): Promise<void> {
    const result = await runProcess(this.ffmpegPath, args, `ffmpeg ${label}`, { signal });
    if (result.exitCode !== 0) {
      throw new MuxError(`FFmpeg ${label}`, result.exitCode, result.stderr || '(no output)');
    }
  }

  async mux(inputs: MuxInput[], outputPath: string, signal?: AbortSignal): Promise<void> {
    logger.info('FFmpeg: muxing', { inputs: inputs.length, outputPath });
    await this.run(buildMuxArgs(inputs, outputPath), 'mux', signal);
  }

  async convertSubtitle(inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void> {
    logger.info('FFmpeg: converting subtitle', { inputPath, outputPath });
    await this.run(['-y', '-hide_banner', '-loglevel', 'error', '-i', inputPath, outputPath], 'convertSubtitle', signal);
  }

  async burnSubtitle(
    videoPath: string,
    subtitlePath: string,
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<void> {
    logger.info('FFmpeg: burning subtitles into video', { videoPath, subtitlePath, outputPath });
    await this.run(buildBurnArgs(videoPath, subtitlePath, outputPath), 'burnSubtitle', signal);
  }
}
