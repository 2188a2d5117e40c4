import { z } from 'zod';
import { getOptionalSecret, type Env } from '../utils/secrets.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_INSTRUCTIONS =
  'You are a travel assistant. Keep responses brief and conversational.';

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),

  livekit: z.object({
    url: z.string({ required_error: 'LIVEKIT_URL is required' })
      .url('LIVEKIT_URL must be a URL')
      .refine(url => /^wss?:\/\//.test(url), 'LIVEKIT_URL must start with ws:// or wss://'),
    apiKey: z.string({ required_error: 'LIVEKIT_API_KEY is required' }).min(1),
    apiSecret: z.string({ required_error: 'LIVEKIT_API_SECRET is required' }).min(1),
  }),

  google: z.object({
    apiKey: z.string({ required_error: 'GOOGLE_API_KEY is required' }).min(1),
    fastModel: z.string().default('gemini-2.5-flash'),
    advancedModel: z.string().default('gemini-2.5-pro'),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
  }),

  agent: z.object({
    name: z.string().default('test-assistant-travel'),
    instructions: z.string().default(DEFAULT_INSTRUCTIONS),
    defaultRoom: z.string().default('travel-demo-room'),
    historyLimit: z.coerce.number().int().positive().optional(),
  }),

  voice: z.object({
    port: z.coerce.number().int().positive().default(8081),
    path: z.string().default('/voice'),
  }),
});

export type Config = z.infer<typeof configSchema>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the typed configuration from the environment.
 *
 * Every missing or invalid value is reported at once; nothing here reads
 * `.env`, the process entry does that before calling in.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    nodeEnv: nonEmpty(env.NODE_ENV),
    logLevel: nonEmpty(env.LOG_LEVEL),

    livekit: {
      url: nonEmpty(env.LIVEKIT_URL),
      apiKey: getOptionalSecret('livekit_api_key', 'LIVEKIT_API_KEY', env),
      apiSecret: getOptionalSecret('livekit_api_secret', 'LIVEKIT_API_SECRET', env),
    },

    google: {
      apiKey: getOptionalSecret('google_api_key', 'GOOGLE_API_KEY', env),
      fastModel: nonEmpty(env.GEMINI_FAST_MODEL),
      advancedModel: nonEmpty(env.GEMINI_ADVANCED_MODEL),
      temperature: nonEmpty(env.GEMINI_TEMPERATURE),
    },

    agent: {
      name: nonEmpty(env.AGENT_NAME),
      instructions: nonEmpty(env.AGENT_INSTRUCTIONS),
      defaultRoom: nonEmpty(env.AGENT_DEFAULT_ROOM),
      historyLimit: nonEmpty(env.AGENT_HISTORY_LIMIT),
    },

    voice: {
      port: nonEmpty(env.VOICE_WS_PORT),
      path: nonEmpty(env.VOICE_WS_PATH),
    },
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError('Invalid configuration', issues);
  }

  return result.data;
}
