import type { StreamSource } from '../catalog/model.js';

export interface DownloadRequest {
  streamRef: string;
  source?: StreamSource;
}

export interface DownloadOptions {
  signal?: AbortSignal;
  /** Append from this byte offset; only passed after the transport reported the resource resumable. */
  resumeFrom?: number;
  onProgress?: (bytesDone: number, bytesTotal: number | null) => void;
}

export interface DownloadResult {
  bytesWritten: number;
  resumable: boolean;
}

/**
 * Byte-level transport. Implementations throw TransportError (transient or
 * not) for transfer failures and rethrow the abort reason when cancelled.
 */
export interface Transport {
  download(request: DownloadRequest, destPath: string, options?: DownloadOptions): Promise<DownloadResult>;
}
