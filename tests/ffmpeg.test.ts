import { describe, expect, test } from 'vitest';

import { buildBurnArgs, buildMuxArgs, escapeFilterPath } from '../src/media/ffmpeg.js';

describe('buildMuxArgs', () => {
  test('stream-copies video and audio with a language tag', () => {
    expect(buildMuxArgs(
      [
        { path: '/w/video.mp4', role: 'video' },
        { path: '/w/audio.m4a', role: 'audio', language: 'es' },
      ],
      '/w/output.mp4',
    )).toEqual([
      '-y', '-hide_banner', '-loglevel', 'error',
      '-i', '/w/video.mp4',
      '-i', '/w/audio.m4a',
      '-map', '0:v:0',
      '-map', '1:a:0',
      '-c:v', 'copy', '-c:a', 'copy',
      '-metadata:s:a:0', 'language=es',
      '-movflags', '+faststart',
      '/w/output.mp4',
    ]);
  });

  test('adds a soft subtitle track in the container\'s codec', () => {
    expect(buildMuxArgs(
      [
        { path: '/w/video.mp4', role: 'video', language: null },
        { path: '/w/audio.m4a', role: 'audio', language: 'en' },
        { path: '/w/subtitle.srt', role: 'subtitle', language: 'es' },
      ],
      '/w/output.mkv',
    )).toEqual([
      '-y', '-hide_banner', '-loglevel', 'error',
      '-i', '/w/video.mp4',
      '-i', '/w/audio.m4a',
      '-i', '/w/subtitle.srt',
      '-map', '0:v:0',
      '-map', '1:a:0',
      '-map', '2:s:0',
      '-c:v', 'copy', '-c:a', 'copy',
      '-c:s', 'srt',
      '-metadata:s:a:0', 'language=en',
      '-metadata:s:s:0', 'language=es',
      '/w/output.mkv',
    ]);
  });

  test('uses mov_text for mp4 subtitles', () => {
    const args = buildMuxArgs(
      [
        { path: 'v.mp4', role: 'video' },
        { path: 's.srt', role: 'subtitle' },
      ],
      'out.mp4',
    );
    expect(args.slice(args.indexOf('-c:s'), args.indexOf('-c:s') + 2)).toEqual(['-c:s', 'mov_text']);
  });
});

describe('subtitle burn-in', () => {
  test('escapes filter paths', () => {
    expect(escapeFilterPath("C:\\subs\\it's.srt")).toBe("C\\:/subs/it\\'s.srt");
  });

  test('re-encodes the video with the subtitles filter', () => {
    expect(buildBurnArgs('/w/video.mp4', '/w/sub.srt', '/w/burned.mp4')).toEqual([
      '-y', '-hide_banner', '-loglevel', 'error',
      '-i', '/w/video.mp4',
      '-vf', 'subtitles=/w/sub.srt',
      '-map', '0:v:0',
      '-c:v', 'libx264', '-preset', 'fast', '-crf', '20',
      '/w/burned.mp4',
    ]);
  });
});
