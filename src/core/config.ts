import { z } from 'zod';

const EnvSchema = z.object({
  BOARDROOM_DB_PATH: z.string().min(1).default('.boardroom/boardroom.sqlite'),
  BOARDROOM_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info')
});

export type BoardroomConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): BoardroomConfig {
  // If you use dotenv, load it before calling this function.
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}
