import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import JSZip from 'jszip';
import {
  CliRunner,
  loadReferenceImage,
  parseReferenceSpec,
} from '../src/presentation/CliRunner.js';
import { BatchOrchestrator } from '../src/application/services/BatchOrchestrator.js';
import { ArchivePackager } from '../src/application/services/ArchivePackager.js';
import { CinematicPromptBuilder } from '../src/core/prompts/index.js';
import { ConfigurationError } from '../src/core/errors/GenerationErrors.js';
import { FakeGenerationClient, SceneBehavior, byScene } from './helpers/FakeGenerationClient.js';

function createRunner(behaviorFor?: (prompt: string) => SceneBehavior) {
  const client = new FakeGenerationClient(behaviorFor);
  const orchestrator = new BatchOrchestrator(client, new CinematicPromptBuilder(), { jobTimeoutMs: 1000 });
  return { client, runner: new CliRunner(orchestrator, new ArchivePackager()) };
}

describe('parseReferenceSpec', () => {
  test('splits path, description and tags', () => {
    expect(parseReferenceSpec('refs/hero.png|Hero portrait|character, costume')).toEqual({
      filePath: 'refs/hero.png',
      description: 'Hero portrait',
      tags: ['character', 'costume'],
    });
  });

  test('tags are optional', () => {
    expect(parseReferenceSpec('alley.jpg|Moody alley')).toEqual({
      filePath: 'alley.jpg',
      description: 'Moody alley',
      tags: [],
    });
  });

  test('requires a description', () => {
    expect(() => parseReferenceSpec('hero.png')).toThrow(ConfigurationError);
  });
});

describe('CliRunner', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'storyboard-cli-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  async function writeScript(contents: string): Promise<string> {
    const scriptPath = path.join(workDir, 'scenes.txt');
    await fs.writeFile(scriptPath, contents, 'utf8');
    return scriptPath;
  }

  test('loads reference images from disk', async () => {
    const imagePath = path.join(workDir, 'hero.png');
    await fs.writeFile(imagePath, Buffer.from('reference-bytes'));

    const reference = await loadReferenceImage(`${imagePath}|Hero|character`);

    expect(reference.mimeType).toBe('image/png');
    expect(reference.data.toString()).toBe('reference-bytes');
    expect(reference.tags).toEqual(['character']);
    await expect(loadReferenceImage(`${workDir}/hero.gif|Hero`)).rejects.toBeInstanceOf(ConfigurationError);
  });

  test('writes succeeded scenes and the archive', async () => {
    const { runner } = createRunner(byScene({ 2: { type: 'fail-job' } }));
    const outDir = path.join(workDir, 'out');
    const scriptPath = await writeScript('One\nTwo\n\nFour\n');

    const exitCode = await runner.run({ scriptPath, imageCount: 5, outDir, references: [] });

    expect(exitCode).toBe(0);
    expect((await fs.readdir(outDir)).sort()).toEqual(['generated_images.zip', 'scene_1.png', 'scene_4.png']);

    const zip = await JSZip.loadAsync(await fs.readFile(path.join(outDir, 'generated_images.zip')));
    expect(Object.keys(zip.files).sort()).toEqual(['scene_1.png', 'scene_4.png']);
  });

  test('exits non-zero when no image was generated', async () => {
    const { runner } = createRunner(() => ({ type: 'fail-job' }));
    const outDir = path.join(workDir, 'out');
    const scriptPath = await writeScript('One');

    await expect(runner.run({ scriptPath, imageCount: 1, outDir, references: [] })).resolves.toBe(1);
    await expect(fs.access(outDir)).rejects.toThrow();
  });

  test('exits non-zero when the script cannot be read', async () => {
    const { runner, client } = createRunner();

    const exitCode = await runner.run({
      scriptPath: path.join(workDir, 'missing.txt'),
      imageCount: 1,
      outDir: path.join(workDir, 'out'),
      references: [],
    });

    expect(exitCode).toBe(1);
    expect(client.verifyCalls).toBe(0);
  });
});
