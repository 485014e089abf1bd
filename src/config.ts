import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  leonardo: z.object({
    apiUrl: z.string().url('Invalid Leonardo API URL format'),
    // May be empty here; a missing key surfaces as AuthError before any job runs
    apiKey: z.string(),
    modelId: z.string().min(1, 'Model id must not be empty'),
    width: z.number().int().min(32).max(1536).multipleOf(8, 'Width must be a multiple of 8'),
    height: z.number().int().min(32).max(1536).multipleOf(8, 'Height must be a multiple of 8'),
    promptMagic: z.boolean(),
    alchemy: z.boolean(),
    initStrength: z.number().min(0.1).max(0.9),
  }),
  prompt: z.object({
    style: z.enum(['cinematic', 'noir', 'documentary', 'anime']),
  }),
  polling: z.object({
    intervalMs: z.number().int().min(100).max(60000),
    maxIntervalMs: z.number().int().min(100).max(120000),
    jobTimeoutMs: z.number().int().min(1000).max(3600000),
    maxConsecutiveErrors: z.number().int().min(1).max(50),
  }),
  retry: z.object({
    maxAttempts: z.number().int().min(1).max(10),
    initialDelayMs: z.number().int().min(100).max(10000),
    maxDelayMs: z.number().int().min(1000).max(60000),
    requestTimeoutMs: z.number().int().min(1000).max(120000),
  }),
  batch: z.object({
    maxConcurrentJobs: z.number().int().min(1).max(4),
    maxConcurrentRuns: z.number().int().min(1).max(4),
  }),
  web: z.object({
    port: z.number().int().min(1024).max(65535),
  }),
  cli: z
    .object({
      scriptPath: z.string().min(1),
      imageCount: z.number().int().min(1).max(252),
      outDir: z.string().min(1),
      references: z.array(z.string().min(1)).max(5, 'At most 5 reference images are allowed'),
    })
    .optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export type CliArgs = Record<string, string | boolean | string[]>;

/**
 * Parse command line arguments; a flag given more than once collects its values
 * Usage: node dist/src/index.js --script scenes.txt --count 5 --reference ref.png|Hero|character
 */
export function parseArgs(argv: readonly string[] = process.argv.slice(2)): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;

    const key = arg.slice(2);
    // Check if next arg is a value or another flag
    const value: string | boolean =
      i + 1 < argv.length && !argv[i + 1].startsWith('--') ? argv[++i] : true;

    const existing = args[key];
    if (existing === undefined) {
      args[key] = value;
    } else if (typeof value === 'string') {
      const previous = Array.isArray(existing) ? existing : typeof existing === 'string' ? [existing] : [];
      args[key] = [...previous, value];
    }
  }

  return args;
}

/**
 * Build and validate configuration from CLI arguments over environment variables over defaults.
 * Throws ZodError when the result is invalid.
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const cliValue = (key: string): string | undefined => {
    const value = cliArgs[key];
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value[value.length - 1];
    return undefined;
  };

  // Helpers to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string, defaultValue: string): string =>
    cliValue(cliKey) ?? env[envKey] ?? defaultValue;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    const cli = cliArgs[cliKey];
    if (cli !== undefined) return cli === true || cli === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const raw = cliValue(cliKey) ?? env[envKey];
    return raw ? Number(raw) : defaultValue;
  };

  const scriptPath = cliValue('script');
  const referenceArg = cliArgs['reference'];
  const references = Array.isArray(referenceArg)
    ? referenceArg
    : typeof referenceArg === 'string'
      ? [referenceArg]
      : [];

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'script-storyboard-generator'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    leonardo: {
      apiUrl: getString('api-url', 'LEONARDO_API_URL', 'https://cloud.leonardo.ai/api/rest/v1'),
      apiKey: env.LEONARDO_API_KEY ?? '',
      modelId: getString('model-id', 'LEONARDO_MODEL_ID', 'ac614f96-1082-45bf-be9d-757f2d31c174'),
      width: getNumber('width', 'IMAGE_WIDTH', 1024),
      height: getNumber('height', 'IMAGE_HEIGHT', 576),
      promptMagic: getBoolean('prompt-magic', 'PROMPT_MAGIC', true),
      alchemy: getBoolean('alchemy', 'ALCHEMY', true),
      initStrength: getNumber('init-strength', 'INIT_STRENGTH', 0.3),
    },
    prompt: {
      style: getString('style', 'PROMPT_STYLE', 'cinematic'),
    },
    polling: {
      intervalMs: getNumber('poll-interval', 'POLL_INTERVAL_MS', 2000),
      maxIntervalMs: getNumber('poll-max-interval', 'POLL_MAX_INTERVAL_MS', 8000),
      jobTimeoutMs: getNumber('job-timeout', 'JOB_TIMEOUT_MS', 60000),
      maxConsecutiveErrors: getNumber('max-poll-errors', 'MAX_CONSECUTIVE_POLL_ERRORS', 5),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 1000),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
      requestTimeoutMs: getNumber('request-timeout', 'REQUEST_TIMEOUT_MS', 30000),
    },
    batch: {
      maxConcurrentJobs: getNumber('max-concurrent-jobs', 'MAX_CONCURRENT_JOBS', 1),
      maxConcurrentRuns: getNumber('max-concurrent-runs', 'MAX_CONCURRENT_RUNS', 1),
    },
    web: {
      port: getNumber('port', 'WEB_PORT', 3001),
    },
    cli: scriptPath
      ? {
          scriptPath,
          imageCount: getNumber('count', 'IMAGE_COUNT', 5),
          outDir: getString('out', 'OUTPUT_DIR', 'output'),
          references,
        }
      : undefined,
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration, printing validation errors and exiting when it is invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  • ${path || 'root'}: ${err.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Image width and height must be multiples of 8 between 32 and 1536');
      console.error('  - Image count must be between 1 and 252');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

function maskKey(key: string): string {
  if (!key) return '(not set)';
  return key.length <= 4 ? '****' : `****${key.slice(-4)}`;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('═'.repeat(68));
  console.error('          Script Storyboard Generator - Configuration');
  console.error('═'.repeat(68));

  console.error(`\n📊 ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 Leonardo: ${config.leonardo.apiUrl}`);
  console.error(`🔑 API key: ${maskKey(config.leonardo.apiKey)}`);
  console.error(`🎞️  Model: ${config.leonardo.modelId} (${config.leonardo.width}x${config.leonardo.height})`);
  console.error(`🎨 Style: ${config.prompt.style}`);
  console.error(
    `\n⚙️  Jobs: ${config.batch.maxConcurrentJobs} concurrent | Poll: ${config.polling.intervalMs}-${config.polling.maxIntervalMs}ms | Timeout: ${config.polling.jobTimeoutMs}ms`
  );
  console.error(
    `🔁 Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`
  );

  if (config.cli) {
    console.error(`\n📝 Script: ${config.cli.scriptPath} → ${config.cli.outDir} (${config.cli.imageCount} image(s))`);
  } else {
    console.error(`\n🌐 Web API: http://localhost:${config.web.port}`);
  }

  console.error('\n' + '─'.repeat(68));
}
