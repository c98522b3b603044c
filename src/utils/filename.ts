/** Strip characters that are invalid in file names and collapse whitespace. */
export function sanitizeFilename(name: string): string {
  return name.replace(/[\\/*?:"<>|]/g, '').replace(/\s+/g, ' ').trim();
}

/** Default output file name for a media item, e.g. "My Video.mp4". */
export function outputFileName(title: string | null, mediaId: string, extension: string): string {
  const base = sanitizeFilename(title ?? '') || sanitizeFilename(mediaId) || 'video';
  return `${base}.${extension}`;
}
