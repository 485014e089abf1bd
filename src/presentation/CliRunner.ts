import { promises as fs } from 'fs';
import path from 'path';
import { BatchOrchestrator } from '../application/services/BatchOrchestrator.js';
import {
  ArchivePackager,
  archiveFileName,
  sceneFileName,
} from '../application/services/ArchivePackager.js';
import { ReferenceImage, mimeTypeForPath } from '../core/entities/ReferenceImage.js';
import { isSucceeded } from '../core/entities/GenerationJob.js';
import { ConfigurationError, errorCodeOf, errorMessageOf } from '../core/errors/GenerationErrors.js';

export interface CliRunOptions {
  scriptPath: string;
  imageCount: number;
  outDir: string;
  references: readonly string[];
}

export interface ParsedReferenceSpec {
  filePath: string;
  description: string;
  tags: string[];
}

/**
 * Parse `path|description|tag1,tag2`; tags are optional
 */
export function parseReferenceSpec(spec: string): ParsedReferenceSpec {
  const [filePath = '', description = '', tagList = ''] = spec.split('|').map((part) => part.trim());
  if (!filePath || !description) {
    throw new ConfigurationError(
      `Invalid reference "${spec}": expected path|description|tag1,tag2`
    );
  }

  const tags = tagList
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);

  return { filePath, description, tags };
}

export async function loadReferenceImage(spec: string): Promise<ReferenceImage> {
  const parsed = parseReferenceSpec(spec);
  const mimeType = mimeTypeForPath(parsed.filePath);
  if (!mimeType) {
    throw new ConfigurationError(
      `Reference image ${parsed.filePath} must be a .png, .jpg or .jpeg file`
    );
  }

  const data = await fs.readFile(parsed.filePath);
  return { data, mimeType, description: parsed.description, tags: parsed.tags };
}

/**
 * One-shot batch from the command line: generates the scenes of a script file,
 * writes each image and the archive to outDir.
 * Resolves to the process exit code; 1 when no image was produced.
 */
export class CliRunner {
  constructor(
    private orchestrator: BatchOrchestrator,
    private packager: ArchivePackager
  ) {}

  async run(options: CliRunOptions, signal?: AbortSignal): Promise<number> {
    try {
      const script = await fs.readFile(options.scriptPath, 'utf8');
      const references = await Promise.all(options.references.map(loadReferenceImage));

      console.error(
        `[CliRunner] ${path.basename(options.scriptPath)}: ${options.imageCount} image(s) requested, ` +
          `${references.length} reference(s)`
      );

      const result = await this.orchestrator.run(script, options.imageCount, references, {
        signal,
        onProgress: ({ completed, total, job }) => {
          console.error(`[CliRunner] ${completed}/${total} scene ${job.lineNumber}: ${job.status}`);
        },
      });

      const succeeded = result.jobs.filter(isSucceeded);
      if (succeeded.length === 0) {
        console.error(`[CliRunner] ✗ No images were generated (${result.requested} scene(s) attempted)`);
        return 1;
      }

      await fs.mkdir(options.outDir, { recursive: true });
      for (const job of succeeded) {
        await fs.writeFile(path.join(options.outDir, sceneFileName(job)), job.image);
      }

      const archivePath = path.join(options.outDir, archiveFileName());
      await fs.writeFile(archivePath, await this.packager.package(result));

      console.error(
        `[CliRunner] ✓ ${succeeded.length} of ${result.requested} image(s) written, archive: ${archivePath}`
      );
      return 0;
    } catch (error) {
      console.error(`[CliRunner] ✗ ${errorCodeOf(error)}: ${errorMessageOf(error)}`);
      return 1;
    }
  }
}
