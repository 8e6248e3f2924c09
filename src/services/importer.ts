/**
 * Video Importer
 *
 * Probes source files and appends them to a timeline store as Videos.
 *
 * IMPLEMENTATION DETAILS:
 * - Files are probed sequentially to avoid overwhelming FFmpeg
 * - A failed file is reported in `failed` and does not stop the rest
 */

import * as path from 'path';
import { TimelineStore } from '../stores/timelineStore';
import { ProbeFn } from '../types/media';
import { Video } from '../types/timeline';
import { createLogger } from '../utils/logger';
import { probeVideo } from './ffmpeg';

const log = createLogger('IMPORT');

export interface ImportFailure {
  path: string;
  error: string;
}

export interface ImportResult {
  imported: Video[];
  failed: ImportFailure[];
}

/**
 * @example
 * const { imported, failed } = await importVideos(store, ['/videos/bout-1.mp4']);
 * failed.forEach((f) => console.warn(`${f.path}: ${f.error}`));
 */
export async function importVideos(
  store: TimelineStore,
  filePaths: readonly string[],
  probe: ProbeFn = probeVideo
): Promise<ImportResult> {
  const imported: Video[] = [];
  const failed: ImportFailure[] = [];

  for (const filePath of filePaths) {
    const absolute = path.resolve(filePath);
    try {
      log.info(`Processing file: ${absolute}`);
      const metadata = await probe(absolute);
      const video = store.getState().addVideo({
        path: absolute,
        duration: metadata.duration,
        frameRate: metadata.frameRate,
        rotation: metadata.rotation,
      });
      imported.push(video);
      log.info(`Imported ${path.basename(absolute)} (${metadata.duration.toFixed(2)}s)`);
    } catch (fileError) {
      const message = fileError instanceof Error ? fileError.message : String(fileError);
      log.error(`Failed to process file ${absolute}:`, message);
      failed.push({ path: absolute, error: message });
    }
  }

  log.info(`Imported ${imported.length} of ${filePaths.length} file(s)`);
  return { imported, failed };
}
