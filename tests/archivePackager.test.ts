import JSZip from 'jszip';
import {
  ArchivePackager,
  archiveFileName,
  sceneFileName,
} from '../src/application/services/ArchivePackager.js';
import { GenerationJob, summarizeJobs } from '../src/core/entities/GenerationJob.js';
import { EmptyArchiveError } from '../src/core/errors/GenerationErrors.js';

function succeeded(index: number, image: string): GenerationJob {
  return {
    index,
    lineNumber: index + 1,
    line: `Line ${index + 1}`,
    prompt: `Scene ${index + 1}: Line ${index + 1}.`,
    status: 'succeeded',
    image: Buffer.from(image),
  };
}

function failed(index: number, status: 'failed' | 'timed_out' | 'cancelled'): GenerationJob {
  return {
    index,
    lineNumber: index + 1,
    line: `Line ${index + 1}`,
    prompt: `Scene ${index + 1}: Line ${index + 1}.`,
    status,
    error: 'Generation failed',
    errorCode: 'JOB_FAILED',
  };
}

describe('ArchivePackager', () => {
  const packager = new ArchivePackager();

  test('contains exactly the succeeded scenes, named by line number', async () => {
    const result = summarizeJobs([
      succeeded(0, 'first'),
      failed(1, 'failed'),
      failed(2, 'timed_out'),
      succeeded(4, 'fifth'),
      failed(5, 'cancelled'),
    ]);

    const zip = await JSZip.loadAsync(await packager.package(result));

    expect(Object.keys(zip.files).sort()).toEqual(['scene_1.png', 'scene_5.png']);
    await expect(zip.file('scene_1.png')?.async('string')).resolves.toBe('first');
    await expect(zip.file('scene_5.png')?.async('string')).resolves.toBe('fifth');
  });

  test('throws EmptyArchiveError when nothing succeeded', async () => {
    const result = summarizeJobs([failed(0, 'failed'), failed(1, 'timed_out')]);

    await expect(packager.package(result)).rejects.toBeInstanceOf(EmptyArchiveError);
    await expect(packager.package(summarizeJobs([]))).rejects.toThrow(
      'No images were generated successfully; nothing to package'
    );
  });
});

describe('file names', () => {
  test('scene files follow the script line number', () => {
    expect(sceneFileName({ lineNumber: 3 })).toBe('scene_3.png');
  });

  test('archive names are sanitised', () => {
    expect(archiveFileName()).toBe('generated_images.zip');
    expect(archiveFileName('My Storyboard: Act #1!')).toBe('my-storyboard-act-1.zip');
    expect(archiveFileName('***')).toBe('generated_images.zip');
  });
});
