import JSZip from 'jszip';
import { GenerationJobBase, RunResult, isSucceeded } from '../../core/entities/GenerationJob.js';
import { EmptyArchiveError } from '../../core/errors/GenerationErrors.js';

export const DEFAULT_ARCHIVE_NAME = 'generated_images';

/**
 * File name of a scene image, tied to its script line
 */
export function sceneFileName(job: Pick<GenerationJobBase, 'lineNumber'>): string {
  return `scene_${job.lineNumber}.png`;
}

/**
 * Download name for an archive, reduced to a filesystem-safe slug
 */
export function archiveFileName(name?: string): string {
  const slug = (name ?? '')
    .substring(0, 40)
    .replace(/[^a-zA-Z0-9\s_-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '')
    .toLowerCase();
  return `${slug || DEFAULT_ARCHIVE_NAME}.zip`;
}

/**
 * Bundles the succeeded images of a run into one ZIP.
 * Failed, timed-out and cancelled scenes are left out; there are no
 * placeholder entries.
 */
export class ArchivePackager {
  constructor(private compressionLevel: number = 6) {}

  async package(result: RunResult): Promise<Buffer> {
    const succeeded = result.jobs.filter(isSucceeded);
    if (succeeded.length === 0) {
      throw new EmptyArchiveError();
    }

    const zip = new JSZip();
    for (const job of succeeded) {
      zip.file(sceneFileName(job), job.image);
    }

    return zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: this.compressionLevel },
    });
  }
}
