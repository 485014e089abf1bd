import fetch from 'node-fetch';
import JSZip from 'jszip';
import { WebServer } from '../src/infrastructure/web/WebServer.js';
import { RunService } from '../src/application/services/RunService.js';
import { BatchOrchestrator } from '../src/application/services/BatchOrchestrator.js';
import { ArchivePackager } from '../src/application/services/ArchivePackager.js';
import { CinematicPromptBuilder } from '../src/core/prompts/index.js';
import { FakeGenerationClient, byScene, imageFor } from './helpers/FakeGenerationClient.js';
import { waitFor } from './helpers/waitFor.js';

const SUFFIX =
  'Cinematic depth, atmospheric lighting, professional cinematography, 8k resolution, dramatic composition.';

describe('WebServer', () => {
  let client: FakeGenerationClient;
  let runService: RunService;
  let server: WebServer;
  let baseUrl: string;

  beforeEach(async () => {
    client = new FakeGenerationClient(byScene({ 2: { type: 'fail-job' } }));
    const orchestrator = new BatchOrchestrator(client, new CinematicPromptBuilder(), {
      maxConcurrentJobs: 1,
      jobTimeoutMs: 1000,
    });
    runService = new RunService(orchestrator, new ArchivePackager());
    server = new WebServer(runService, 0, () => ({ circuitBreaker: { state: 'closed' } }));
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  const postJson = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });

  async function startRun(body: unknown): Promise<string> {
    const res = await postJson('/api/runs', body);
    expect(res.status).toBe(202);
    const payload = await res.json();
    const runId: string = payload.data.runId;
    await waitFor(() => runService.getRun(runId)?.status === 'completed');
    return runId;
  }

  test('GET /api/health reports the service state', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    const payload = await res.json();

    expect(res.status).toBe(200);
    expect(payload.data.status).toBe('ok');
    expect(payload.data.circuitBreaker).toEqual({ state: 'closed' });
    expect(payload.data.runs.total).toBe(0);
  });

  test('POST /api/runs validates the body', async () => {
    const res = await postJson('/api/runs', { script: 'One', imageCount: 0 });
    const payload = await res.json();

    expect(res.status).toBe(400);
    expect(payload.success).toBe(false);
    expect(payload.error).toMatch(/^imageCount: /);
  });

  test('POST /api/runs rejects reference data that is not base64', async () => {
    const res = await postJson('/api/runs', {
      script: 'One',
      imageCount: 1,
      references: [{ data: 'not base64!', mimeType: 'image/png', description: 'Hero portrait' }],
    });
    const payload = await res.json();

    expect(res.status).toBe(400);
    expect(payload.error).toBe('references.0.data: Reference image data must be base64 encoded');
    expect(runService.getAllRuns()).toHaveLength(0);
  });

  test('runs a batch and serves its status without image bytes', async () => {
    const runId = await startRun({ script: 'One\nTwo\nThree', imageCount: 3 });

    const res = await fetch(`${baseUrl}/api/runs/${runId}`);
    const payload = await res.json();

    expect(res.status).toBe(200);
    expect(payload.data.status).toBe('completed');
    expect(payload.data.summary).toEqual({ requested: 3, succeeded: 2, failed: 1, cancelled: 0 });
    expect(payload.data.jobs[0]).toEqual(
      expect.objectContaining({ line_number: 1, status: 'succeeded', image_available: true, file_name: 'scene_1.png' })
    );
    expect(payload.data.jobs[1]).toEqual(
      expect.objectContaining({ line_number: 2, status: 'failed', image_available: false, error_code: 'JOB_FAILED' })
    );
    expect(payload.data.jobs[0]).not.toHaveProperty('image');

    const list = await (await fetch(`${baseUrl}/api/runs`)).json();
    expect(list.data.map((run: { id: string }) => run.id)).toEqual([runId]);
  });

  test('describes uploaded references in every prompt', async () => {
    await startRun({
      script: 'A hero walks',
      imageCount: 1,
      references: [
        {
          data: Buffer.from('reference-bytes').toString('base64'),
          mimeType: 'image/png',
          description: 'Hero portrait',
          tags: ['character'],
        },
      ],
    });

    expect(client.submitted).toEqual([
      `Scene 1: A hero walks. ${SUFFIX} Use reference image 'Hero portrait' for character consistency.`,
    ]);
    expect(client.submittedReferences[0][0].data.toString()).toBe('reference-bytes');
  });

  test('serves single scene images', async () => {
    const runId = await startRun({ script: 'One\nTwo', imageCount: 2 });

    const res = await fetch(`${baseUrl}/api/runs/${runId}/images/1`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('image/png');
    expect(res.headers.get('content-disposition')).toBe('attachment; filename="scene_1.png"');
    expect(await res.buffer()).toEqual(imageFor(`Scene 1: One. ${SUFFIX}`));

    expect((await fetch(`${baseUrl}/api/runs/${runId}/images/2`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/runs/${runId}/images/zero`)).status).toBe(400);
  });

  test('serves the archive of succeeded scenes', async () => {
    const runId = await startRun({ script: 'One\nTwo\nThree', imageCount: 3 });

    const res = await fetch(`${baseUrl}/api/runs/${runId}/archive`);
    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/zip');

    const zip = await JSZip.loadAsync(await res.buffer());
    expect(Object.keys(zip.files).sort()).toEqual(['scene_1.png', 'scene_3.png']);
  });

  test('answers 409 when the run has nothing to archive', async () => {
    const runId = await startRun({ script: ['', 'Two'], imageCount: 1 });

    const res = await fetch(`${baseUrl}/api/runs/${runId}/archive`);
    const payload = await res.json();

    expect(res.status).toBe(409);
    expect(payload.error).toBe('No images were generated successfully; nothing to package');
  });

  test('answers 404 for unknown runs and 409 when cancelling a finished run', async () => {
    expect((await fetch(`${baseUrl}/api/runs/missing`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/runs/missing/archive`)).status).toBe(404);
    expect((await postJson('/api/runs/missing/cancel', {})).status).toBe(404);

    const runId = await startRun({ script: 'One', imageCount: 1 });
    expect((await postJson(`/api/runs/${runId}/cancel`, {})).status).toBe(409);
  });
});
