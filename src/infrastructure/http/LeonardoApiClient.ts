import fetch, { RequestInit, Response } from 'node-fetch';
import FormData from 'form-data';
import { z } from 'zod';
import {
  AwaitImageOptions,
  IGenerationClient,
  JobBudget,
  JobId,
  JobStatus,
} from '../../core/interfaces/IGenerationClient.js';
import {
  MAX_REFERENCE_IMAGES,
  ReferenceImage,
  ReferenceImageSet,
  extensionForMimeType,
} from '../../core/entities/ReferenceImage.js';
import {
  AuthError,
  CancelledError,
  JobFailedError,
  SubmissionError,
  TimeoutError,
  TransientPollError,
  errorMessageOf,
} from '../../core/errors/GenerationErrors.js';
import {
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  isRetryableError,
  nextDelay,
  sleep,
  withRetry,
} from '../../utils/retry.js';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface LeonardoSettings {
  apiUrl: string;
  apiKey: string;
  modelId: string;
  width: number;
  height: number;
  promptMagic: boolean;
  alchemy: boolean;
  initStrength: number;
}

export interface PollingConfig {
  intervalMs: number;
  maxIntervalMs: number;
  multiplier: number;
  timeoutMs: number;
  maxConsecutiveErrors: number;
}

export const DEFAULT_POLLING_CONFIG: PollingConfig = {
  intervalMs: 2000,
  maxIntervalMs: 8000,
  multiplier: 1.5,
  timeoutMs: 60000,
  maxConsecutiveErrors: 5,
};

export interface LeonardoClientOptions {
  polling?: Partial<PollingConfig>;
  retry?: RetryConfig;
  circuitBreaker?: CircuitBreaker;
  fetchFn?: FetchFn;
  debug?: boolean;
}

const CreateGenerationSchema = z.object({
  sdGenerationJob: z.object({
    generationId: z.string().min(1),
  }),
});

const GenerationStatusSchema = z.object({
  generations_by_pk: z
    .object({
      status: z.string(),
      generated_images: z.array(z.object({ url: z.string().min(1) })).default([]),
    })
    .nullable(),
});

const InitImageSchema = z.object({
  uploadInitImage: z.object({
    id: z.string().min(1),
    url: z.string().min(1),
    // Presigned POST fields arrive as a JSON-encoded string
    fields: z.union([z.string(), z.record(z.string())]),
  }),
});

const UploadFieldsSchema = z.record(z.string());

class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    body: string
  ) {
    super(`HTTP ${status}: ${body}`);
  }
}

/**
 * Leonardo REST API client
 * Submission is never retried (a retried POST could bill twice); polling and
 * image downloads are. Every request is bounded by the job deadline and the
 * abort signal it is given.
 */
export class LeonardoApiClient implements IGenerationClient {
  private readonly settings: LeonardoSettings;
  private readonly polling: PollingConfig;
  private readonly retryConfig: RetryConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly fetchFn: FetchFn;
  private readonly debug: boolean;

  constructor(settings: LeonardoSettings, options: LeonardoClientOptions = {}) {
    this.settings = { ...settings, apiUrl: settings.apiUrl.replace(/\/+$/, '') };
    this.polling = { ...DEFAULT_POLLING_CONFIG, ...options.polling };
    this.retryConfig = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker(5, 60000);
    this.fetchFn = options.fetchFn ?? fetch;
    this.debug = options.debug ?? false;
  }

  async verifyCredentials(signal?: AbortSignal): Promise<void> {
    if (!this.settings.apiKey.trim()) {
      throw new AuthError('LEONARDO_API_KEY is not configured');
    }

    let res: Response;
    try {
      res = await withRetry(
        () => this.request(`${this.settings.apiUrl}/me`, { headers: this.headers() }, { signal }),
        this.retryConfig,
        { shouldRetry: isRetryableError, signal }
      );
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw new SubmissionError(`Could not reach Leonardo API: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(`Leonardo API rejected the API key (${res.status})`);
    }
    if (!res.ok) {
      throw new SubmissionError(`Credential check failed (${res.status}): ${await res.text()}`);
    }
  }

  async submit(prompt: string, references: ReferenceImageSet, options: JobBudget = {}): Promise<JobId> {
    if (references.length > MAX_REFERENCE_IMAGES) {
      throw new SubmissionError(
        `At most ${MAX_REFERENCE_IMAGES} reference images are allowed, got ${references.length}`
      );
    }
    if (!prompt.trim()) {
      throw new SubmissionError('Prompt must not be empty');
    }

    const payload: Record<string, unknown> = {
      prompt,
      modelId: this.settings.modelId,
      width: this.settings.width,
      height: this.settings.height,
      num_images: 1,
      promptMagic: this.settings.promptMagic,
      alchemy: this.settings.alchemy,
    };

    // Only the first reference steers the image directly; every reference is
    // described in the prompt text.
    if (references.length > 0) {
      payload.init_image_id = await this.uploadInitImage(references[0], options);
      payload.init_strength = this.settings.initStrength;
    }

    const res = await this.sendSubmission(
      `${this.settings.apiUrl}/generations`,
      {
        method: 'POST',
        headers: this.headers(true),
        body: JSON.stringify(payload),
      },
      options
    );

    const parsed = CreateGenerationSchema.safeParse(await this.readJson(res));
    if (!parsed.success) {
      throw new SubmissionError('Leonardo API response did not include a generation id');
    }

    const generationId = parsed.data.sdGenerationJob.generationId;
    console.error(`[LeonardoApiClient] Generation ${generationId} submitted`);
    return generationId;
  }

  async poll(jobId: JobId, options: JobBudget = {}): Promise<JobStatus> {
    let res: Response;
    try {
      res = await this.request(
        `${this.settings.apiUrl}/generations/${encodeURIComponent(jobId)}`,
        { headers: this.headers() },
        options
      );
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TimeoutError) {
        throw error;
      }
      const status = error instanceof HttpStatusError ? error.status : undefined;
      throw new TransientPollError(`Polling generation ${jobId} failed: ${errorMessageOf(error)}`, {
        cause: error,
        status,
      });
    }

    if (res.status === 429) {
      throw new TransientPollError(`Polling generation ${jobId} was rate limited`, { status: 429 });
    }
    if (!res.ok) {
      throw new JobFailedError(
        `Status request for generation ${jobId} failed (${res.status}): ${await res.text()}`
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new TransientPollError(`Generation ${jobId} status was not valid JSON`, { cause: error });
    }

    const parsed = GenerationStatusSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientPollError(`Unexpected status payload for generation ${jobId}`);
    }

    const generation = parsed.data.generations_by_pk;
    if (!generation) {
      // Not visible yet right after submission
      return { state: 'pending' };
    }

    switch (generation.status) {
      case 'COMPLETE': {
        const image = generation.generated_images[0];
        return image ? { state: 'succeeded', imageUrl: image.url } : { state: 'running' };
      }
      case 'FAILED':
        throw new JobFailedError(`Generation ${jobId} failed on the remote service`);
      default:
        return { state: 'running' };
    }
  }

  async awaitImage(jobId: JobId, options: AwaitImageOptions = {}): Promise<Buffer> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.polling.timeoutMs;
    const deadline = options.deadline ?? Date.now() + timeoutMs;
    const budget: JobBudget = { signal, deadline };
    const timedOut = () =>
      new TimeoutError(`Generation ${jobId} did not finish within ${timeoutMs}ms`, timeoutMs);

    let delay = this.polling.intervalMs;
    let consecutiveErrors = 0;

    for (let attempt = 1; ; attempt++) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw timedOut();
      }

      await sleep(Math.min(delay, remaining), signal);

      try {
        const status = await this.poll(jobId, budget);
        consecutiveErrors = 0;

        if (signal?.aborted) {
          throw new CancelledError(`Generation ${jobId} cancelled`);
        }
        if (status.state === 'succeeded') {
          console.error(`[LeonardoApiClient] Generation ${jobId} complete after ${attempt} poll(s)`);
          return await this.fetchImage(status.imageUrl, budget);
        }
        if (this.debug) {
          console.error(`[LeonardoApiClient] Generation ${jobId} ${status.state} (poll ${attempt})`);
        }
      } catch (error) {
        if (error instanceof TimeoutError) {
          throw timedOut();
        }
        if (!(error instanceof TransientPollError)) {
          throw error;
        }

        consecutiveErrors++;
        console.warn(
          `[LeonardoApiClient] Poll error for ${jobId} (attempt ${attempt}): ${error.message}`
        );
        if (consecutiveErrors >= this.polling.maxConsecutiveErrors) {
          throw new TransientPollError(
            `Polling generation ${jobId} failed: ${consecutiveErrors} consecutive errors`,
            { cause: error, status: error.status }
          );
        }
      }

      delay = nextDelay(delay, {
        multiplier: this.polling.multiplier,
        maxDelayMs: this.polling.maxIntervalMs,
      });
    }
  }

  /**
   * Download generated image bytes
   */
  async fetchImage(url: string, budget: JobBudget = {}): Promise<Buffer> {
    try {
      return await withRetry(
        async () => {
          const res = await this.send(url, {}, budget);
          if (!res.ok) {
            throw new Error(`HTTP ${res.status}`);
          }
          return Buffer.from(await res.arrayBuffer());
        },
        this.retryConfig,
        {
          shouldRetry: (error) => !(error instanceof TimeoutError) && isRetryableError(error),
          signal: budget.signal,
        }
      );
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TimeoutError) {
        throw error;
      }
      throw new JobFailedError(`Could not download generated image: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }
  }

  getCircuitBreakerStats() {
    return this.circuitBreaker.getStats();
  }

  private async uploadInitImage(reference: ReferenceImage, budget: JobBudget): Promise<string> {
    const extension = extensionForMimeType(reference.mimeType);
    const res = await this.sendSubmission(
      `${this.settings.apiUrl}/init-image`,
      {
        method: 'POST',
        headers: this.headers(true),
        body: JSON.stringify({ extension }),
      },
      budget
    );

    const parsed = InitImageSchema.safeParse(await this.readJson(res));
    if (!parsed.success) {
      throw new SubmissionError('Leonardo API did not return an init image upload target');
    }

    const { id, url, fields } = parsed.data.uploadInitImage;
    const uploadFields = this.parseUploadFields(fields);

    const form = new FormData();
    for (const [key, value] of Object.entries(uploadFields)) {
      form.append(key, value);
    }
    form.append('file', reference.data, {
      filename: `reference.${extension}`,
      contentType: reference.mimeType,
    });

    let uploadRes: Response;
    try {
      uploadRes = await this.send(url, { method: 'POST', body: form }, budget);
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TimeoutError) {
        throw error;
      }
      throw new SubmissionError(`Reference image upload failed: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }
    if (!uploadRes.ok) {
      throw new SubmissionError(`Reference image upload failed (${uploadRes.status})`);
    }

    console.error(`[LeonardoApiClient] Reference '${reference.description}' uploaded as ${id}`);
    return id;
  }

  private parseUploadFields(fields: string | Record<string, string>): Record<string, string> {
    if (typeof fields !== 'string') {
      return fields;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(fields);
    } catch (error) {
      throw new SubmissionError('Init image upload fields were not valid JSON', { cause: error });
    }

    const parsed = UploadFieldsSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new SubmissionError('Init image upload fields had an unexpected shape');
    }
    return parsed.data;
  }

  /**
   * POST that maps every failure onto the submission taxonomy
   */
  private async sendSubmission(url: string, init: RequestInit, budget: JobBudget): Promise<Response> {
    let res: Response;
    try {
      res = await this.request(url, init, budget);
    } catch (error) {
      if (error instanceof CancelledError || error instanceof TimeoutError) {
        throw error;
      }
      throw new SubmissionError(`Request to ${url} failed: ${errorMessageOf(error)}`, {
        cause: error,
      });
    }

    if (res.status === 401 || res.status === 403) {
      throw new AuthError(`Leonardo API rejected the API key (${res.status})`);
    }
    if (!res.ok) {
      throw new SubmissionError(`Leonardo API error (${res.status}): ${await res.text()}`);
    }
    return res;
  }

  /**
   * Routes a request through the circuit breaker; 5xx responses count as failures
   */
  private async request(url: string, init: RequestInit, budget: JobBudget = {}): Promise<Response> {
    // A cancelled request says nothing about the service's health
    const outcome = await this.circuitBreaker.execute(async () => {
      try {
        const res = await this.send(url, init, budget);
        if (res.status >= 500) {
          throw new HttpStatusError(res.status, await res.text());
        }
        return res;
      } catch (error) {
        if (error instanceof CancelledError) {
          return error;
        }
        throw error;
      }
    });

    if (outcome instanceof CancelledError) {
      throw outcome;
    }
    return outcome;
  }

  /**
   * One fetch, aborted at the request timeout, the job deadline or the
   * caller's signal, whichever comes first
   */
  private async send(url: string, init: RequestInit, budget: JobBudget = {}): Promise<Response> {
    const { signal, deadline } = budget;
    if (signal?.aborted) {
      throw new CancelledError(`Request to ${url} cancelled`);
    }

    let timeoutMs = this.retryConfig.timeoutMs;
    let boundByDeadline = false;
    if (deadline !== undefined) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new TimeoutError(`Request to ${url} exceeded the job deadline`, 0);
      }
      boundByDeadline = remaining <= timeoutMs;
      timeoutMs = Math.min(timeoutMs, remaining);
    }

    const controller = new AbortController();
    let expired = false;
    const onAbort = () => controller.abort();
    const timer = setTimeout(() => {
      expired = true;
      controller.abort();
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    // Settles even if the fetch implementation ignores the signal
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new Error(`Timeout after ${timeoutMs}ms`)),
        { once: true }
      );
    });

    try {
      return await Promise.race([
        this.fetchFn(url, { ...init, signal: controller.signal }),
        aborted,
      ]);
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(`Request to ${url} cancelled`);
      }
      if (expired && boundByDeadline) {
        throw new TimeoutError(`Request to ${url} exceeded the job deadline`, timeoutMs);
      }
      if (expired) {
        throw new Error(`Timeout after ${timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async readJson(res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (error) {
      throw new SubmissionError('Leonardo API returned invalid JSON', { cause: error });
    }
  }

  private headers(withBody = false): Record<string, string> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: `Bearer ${this.settings.apiKey}`,
    };
    if (withBody) {
      headers['content-type'] = 'application/json';
    }
    return headers;
  }
}
