import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Language and quality
  PREFERRED_LANGUAGE:          z.string().min(1).default('es'),
  REQUESTED_QUALITY:           z.string().min(1).optional(),
  ALLOW_FALLBACK_TO_ORIGINAL:  z.string().transform(v => v === 'true').default('false'),
  SUBTITLE_MODE:               z.enum(['soft', 'burned-in']).default('soft'),

  // Execution
  RETRY_BUDGET:                z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS:         z.coerce.number().int().min(0).default(1_000),
  PARALLEL_FETCH:              z.string().transform(v => v === 'true').default('true'),
  HTTP_IDLE_TIMEOUT_MS:        z.coerce.number().int().min(1).default(30_000),

  // Local storage
  OUTPUT_DIR:                  z.string().default(join(homedir(), 'Desktop')),
  OUTPUT_FORMAT:               z.enum(['mp4', 'mkv']).default('mp4'),
  TEMP_DIR:                    z.string().default(join(tmpdir(), 'polyglot-dl')),

  // External tools
  YTDLP_PATH:                  z.string().min(1).default('yt-dlp'),
  FFMPEG_PATH:                 z.string().min(1).default('ffmpeg'),
  COOKIE_BROWSERS:             z.string().default('chrome,firefox,brave,edge,opera,vivaldi,safari'),

  // Logging
  LOG_LEVEL:                   z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                  z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Run configuration ─────────────────────────────────────────────────────────

export const SUBTITLE_MODES = ['soft', 'burned-in'] as const;
export type SubtitleMode = typeof SUBTITLE_MODES[number];

export const OUTPUT_FORMATS = ['mp4', 'mkv'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const RunConfigSchema = z.object({
  preferredLanguage:       z.string().min(1),
  requestedQuality:        z.string().min(1).optional(),
  allowFallbackToOriginal: z.boolean(),
  subtitleMode:            z.enum(SUBTITLE_MODES),
  retryBudget:             z.number().int().min(1),
  retryBaseDelayMs:        z.number().int().min(0),
  parallelFetch:           z.boolean(),
  outputDir:               z.string().min(1),
  outputFormat:            z.enum(OUTPUT_FORMATS),
  tempDir:                 z.string().min(1),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

/**
 * Build a run configuration from the environment, with per-run overrides
 * (CLI flags, test settings) taking precedence.
 */
export function loadRunConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  const fromEnv: RunConfig = {
    preferredLanguage:       env.PREFERRED_LANGUAGE,
    requestedQuality:        env.REQUESTED_QUALITY,
    allowFallbackToOriginal: env.ALLOW_FALLBACK_TO_ORIGINAL,
    subtitleMode:            env.SUBTITLE_MODE,
    retryBudget:             env.RETRY_BUDGET,
    retryBaseDelayMs:        env.RETRY_BASE_DELAY_MS,
    parallelFetch:           env.PARALLEL_FETCH,
    outputDir:               env.OUTPUT_DIR,
    outputFormat:            env.OUTPUT_FORMAT,
    tempDir:                 env.TEMP_DIR,
  };

  const result = RunConfigSchema.safeParse({ ...fromEnv, ...overrides });
  if (!result.success) {
    const invalid = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid run configuration: ${invalid}`);
  }
  return result.data;
}

// ── External tools ────────────────────────────────────────────────────────────

export const TOOLS = {
  ytDlp:          env.YTDLP_PATH,
  ffmpeg:         env.FFMPEG_PATH,
  cookieBrowsers: env.COOKIE_BROWSERS.split(',').map(b => b.trim()).filter(Boolean),
} as const;

export const TRANSPORT = {
  idleTimeoutMs: env.HTTP_IDLE_TIMEOUT_MS,
} as const;
