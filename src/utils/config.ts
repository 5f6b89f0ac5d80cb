import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');

loadDotenv({ path: resolve(PROJECT_ROOT, '.env') });

const envSchema = z.object({
  // Files
  HERALD_CONFIG: z.string().default('config/herald.json'),
  // Overrides general.template_path from the config file when set
  HERALD_TEMPLATES: z.string().optional(),
  HERALD_KEY_PATH: z.string().default('.herald_key'),
  HERALD_CREDENTIALS: z.string().default('credentials.enc'),

  // Template broadcast once every platform is up (optional)
  STARTUP_TEMPLATE: z.string().optional(),

  // Infrastructure
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:');
  for (const issue of parsed.error.issues) {
    console.error(`   ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}

export const config = parsed.data;

/** Resolve a configured path against the project root unless already absolute. */
export function resolveProjectPath(path: string): string {
  return resolve(PROJECT_ROOT, path);
}

export { PROJECT_ROOT };
