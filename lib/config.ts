import { z } from 'zod'

import { DEFAULT_SETTLE_MS } from '@/lib/dropfolder/source'
import type { DriveCredentials } from '@/lib/gdrive/client'
import { DEFAULT_MAX_AUDIO_BYTES } from '@/lib/pipeline/stages/download'
import { DEFAULT_MAX_TRANSCRIPT_CHARS } from '@/lib/pipeline/stages/transcribe'

const TRUE_VALUES = ['1', 'true', 'yes', 'on']

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)
const bool = (fallback: boolean) =>
  z
    .string()
    .transform(value => TRUE_VALUES.includes(value.toLowerCase()))
    .default(fallback ? 'true' : 'false')

const EnvSchema = z.object({
  DATA_DIR: z.string().default('data'),
  DATABASE_URL: z.string().url().optional(),

  MAX_AUDIO_BYTES: positiveInt(DEFAULT_MAX_AUDIO_BYTES),
  MAX_TRANSCRIPT_CHARS: positiveInt(DEFAULT_MAX_TRANSCRIPT_CHARS),
  STAGE_TIMEOUT_MS: positiveInt(30 * 60 * 1000),
  MAX_STAGE_ATTEMPTS: positiveInt(3),
  TRANSIENT_RETRIES: nonNegativeInt(2),
  RETRY_BASE_DELAY_MS: nonNegativeInt(1000),
  WORKER_CONCURRENCY: positiveInt(1),

  DISCOVERY_CRON: z.string().default('*/5 * * * *'),
  AUTO_PROCESS_CRON: z.string().default('*/1 * * * *'),
  AUTO_PROCESS_ENABLED: bool(true),
  AUTO_MAX_BATCH: positiveInt(3),
  DISCOVERY_MAX_PAGES: positiveInt(20),

  PLAUD_TOKEN: z.string().optional(),
  PLAUD_BASE_URL: z.string().url().default('https://api.plaud.ai'),
  DROP_FOLDER: z.string().optional(),
  DROP_SETTLE_MS: nonNegativeInt(DEFAULT_SETTLE_MS),

  TRANSCRIPTION_ENGINE: z.enum(['whisper', 'assemblyai']).default('whisper'),
  TRANSCRIPTION_LANGUAGE: z.string().optional(),
  WHISPER_BINARY: z.string().default('whisper'),
  WHISPER_MODEL: z.string().default('base'),
  WHISPER_MODEL_DIR: z.string().optional(),
  ASSEMBLYAI_API_KEY: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  PROMPT_PATH: z.string().default('prompts/structure_outline.md'),

  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),
  GOOGLE_REFRESH_TOKEN: z.string().optional(),
  GOOGLE_SERVICE_ACCOUNT_KEY: z.string().optional(),
  GDRIVE_ROOT_FOLDER: z.string().default('ScribeFlow'),

  CRON_SECRET: z.string().optional(),
})

export interface AppConfig {
  dataDir: string
  databaseUrl?: string
  limits: { maxAudioBytes: number; maxTranscriptChars: number }
  orchestrator: {
    maxStageAttempts: number
    stageTimeoutMs: number
    retry: { retries: number; baseDelayMs: number }
    concurrency: number
  }
  schedule: {
    discoveryCron: string
    autoProcessCron: string
    autoProcessEnabled: boolean
    autoMaxBatch: number
    discoveryMaxPages: number
  }
  plaud?: { token: string; baseUrl: string }
  /** Local folder watched for audio files; exclusive with `plaud`. */
  dropFolder?: { dir: string; settleMs: number }
  transcription:
    | { engine: 'whisper'; binary: string; model: string; modelDir?: string; language?: string }
    | { engine: 'assemblyai'; apiKey: string; language?: string }
  structuring: { apiKey?: string; baseUrl: string; model: string; promptPath: string }
  drive?: DriveCredentials
  driveRootFolder: string
  cronSecret?: string
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
  }
}

function driveConfig(env: z.infer<typeof EnvSchema>): DriveCredentials | undefined {
  if (env.GOOGLE_SERVICE_ACCOUNT_KEY) {
    return { type: 'service_account', key: env.GOOGLE_SERVICE_ACCOUNT_KEY }
  }
  if (env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET && env.GOOGLE_REFRESH_TOKEN) {
    return {
      type: 'oauth',
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      refreshToken: env.GOOGLE_REFRESH_TOKEN,
    }
  }
  return undefined
}

/**
 * Read configuration from the environment. Blank variables count as unset.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter((entry): entry is [string, string] => !!entry[1] && entry[1].trim() !== ''),
  )

  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
  }
  const env = parsed.data

  if (env.TRANSCRIPTION_ENGINE === 'assemblyai' && !env.ASSEMBLYAI_API_KEY) {
    throw new ConfigError(['ASSEMBLYAI_API_KEY: required when TRANSCRIPTION_ENGINE=assemblyai'])
  }
  if (env.PLAUD_TOKEN && env.DROP_FOLDER) {
    throw new ConfigError(['DROP_FOLDER: set either PLAUD_TOKEN or DROP_FOLDER, not both'])
  }

  return {
    dataDir: env.DATA_DIR,
    databaseUrl: env.DATABASE_URL,
    limits: { maxAudioBytes: env.MAX_AUDIO_BYTES, maxTranscriptChars: env.MAX_TRANSCRIPT_CHARS },
    orchestrator: {
      maxStageAttempts: env.MAX_STAGE_ATTEMPTS,
      stageTimeoutMs: env.STAGE_TIMEOUT_MS,
      retry: { retries: env.TRANSIENT_RETRIES, baseDelayMs: env.RETRY_BASE_DELAY_MS },
      concurrency: env.WORKER_CONCURRENCY,
    },
    schedule: {
      discoveryCron: env.DISCOVERY_CRON,
      autoProcessCron: env.AUTO_PROCESS_CRON,
      autoProcessEnabled: env.AUTO_PROCESS_ENABLED,
      autoMaxBatch: env.AUTO_MAX_BATCH,
      discoveryMaxPages: env.DISCOVERY_MAX_PAGES,
    },
    plaud: env.PLAUD_TOKEN ? { token: env.PLAUD_TOKEN, baseUrl: env.PLAUD_BASE_URL } : undefined,
    dropFolder: env.DROP_FOLDER ? { dir: env.DROP_FOLDER, settleMs: env.DROP_SETTLE_MS } : undefined,
    transcription:
      env.TRANSCRIPTION_ENGINE === 'assemblyai' && env.ASSEMBLYAI_API_KEY
        ? { engine: 'assemblyai', apiKey: env.ASSEMBLYAI_API_KEY, language: env.TRANSCRIPTION_LANGUAGE }
        : {
            engine: 'whisper',
            binary: env.WHISPER_BINARY,
            model: env.WHISPER_MODEL,
            modelDir: env.WHISPER_MODEL_DIR,
            language: env.TRANSCRIPTION_LANGUAGE,
          },
    structuring: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      promptPath: env.PROMPT_PATH,
    },
    drive: driveConfig(env),
    driveRootFolder: env.GDRIVE_ROOT_FOLDER,
    cronSecret: env.CRON_SECRET,
  }
}
