import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../src/config.js';
import { StoryboardApp } from '../src/presentation/StoryboardApp.js';
import { Response } from 'node-fetch';
import { createFakeFetch, generationStatus, jsonBody, jsonResponse } from './helpers/fakeFetch.js';

const API_URL = 'https://api.test/v1';

describe('StoryboardApp', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'storyboard-app-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  test('runs a CLI batch against the generation API', async () => {
    const scriptPath = path.join(workDir, 'scenes.txt');
    const outDir = path.join(workDir, 'out');
    await fs.writeFile(scriptPath, 'A hero walks\nThe city burns\n', 'utf8');

    let generations = 0;
    const { fetchFn, calls } = createFakeFetch((url, init) => {
      if (url === `${API_URL}/me`) {
        return jsonResponse({ user_details: [] });
      }
      if (url === `${API_URL}/generations` && init?.method === 'POST') {
        generations++;
        return jsonResponse({ sdGenerationJob: { generationId: `gen-${generations}` } });
      }
      const status = /\/generations\/(gen-\d+)$/.exec(url);
      if (status) {
        return jsonResponse(generationStatus('COMPLETE', [`https://cdn.test/${status[1]}.png`]));
      }
      return new Response(Buffer.from(`bytes:${url}`));
    });

    const config = loadConfig(
      ['--script', scriptPath, '--count', '2', '--out', outDir, '--style', 'noir', '--poll-interval', '100'],
      { LEONARDO_API_KEY: 'test-secret', LEONARDO_API_URL: API_URL }
    );
    const app = new StoryboardApp(config, fetchFn);

    await expect(app.runCli()).resolves.toBe(0);

    expect((await fs.readdir(outDir)).sort()).toEqual(['generated_images.zip', 'scene_1.png', 'scene_2.png']);
    expect((await fs.readFile(path.join(outDir, 'scene_2.png'))).toString()).toBe(
      'bytes:https://cdn.test/gen-2.png'
    );

    const submission = calls.find((call) => call.url === `${API_URL}/generations`);
    expect(submission && jsonBody(submission)).toEqual(
      expect.objectContaining({
        prompt:
          'Scene 1: A hero walks. Film noir, high-contrast black and white, hard shadows, low-key lighting, 35mm film grain, moody composition.',
        modelId: 'ac614f96-1082-45bf-be9d-757f2d31c174',
      })
    );
  });

  test('refuses CLI mode without a script', async () => {
    const app = new StoryboardApp(loadConfig([], {}));
    await expect(app.runCli()).rejects.toThrow('No --script given; nothing to run in CLI mode');
  });
});
