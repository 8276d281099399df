import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DISCORD_TOKEN: z.string({ required_error: 'DISCORD_TOKEN is required' }).min(1, 'DISCORD_TOKEN is required'),
  DISCORD_GUILD_ID: z.string().regex(/^\d+$/, 'Must be a Discord guild snowflake').optional(),
  LETTERBOXD_REQUEST_DELAY_SECONDS: z.string().default('15').transform(Number).pipe(z.number().min(0)),
  LETTERBOXD_REQUEST_TIMEOUT_SECONDS: z.string().default('30').transform(Number).pipe(z.number().positive()),
  LETTERBOXD_FETCH_RETRIES: z.string().default('0').transform(Number).pipe(z.number().int().min(0)),
  COMMAND_TIMEOUT_MINUTES: z.string().default('14').transform(Number).pipe(z.number().positive()),
  MAX_CONCURRENT_COMMANDS: z.string().default('2').transform(Number).pipe(z.number().int().min(1)),
  BOT_PRESENCE: z.string().default('Try using /random_movie!'),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  // Treat empty strings (e.g. `DISCORD_GUILD_ID=` in .env) as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  return envSchema.safeParse(cleaned);
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

const env = validateEnv();
export default env;
