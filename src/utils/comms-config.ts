import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { createLogger } from '../middleware/logger.js';
import { ConfigurationError } from './errors.js';

const logger = createLogger({ component: 'config' });

// ── Zod schema for config/herald.json ───────────────────────────────

const GeneralSchema = z.object({
  rate_limit: z.boolean().default(true),
  rate_limit_max_requests: z.number().int().positive().default(300),
  rate_limit_window_minutes: z.number().positive().default(180),
  template_path: z.string().default('templates/message_templates.json'),
});

const MonitoringSchema = z.object({
  enabled: z.boolean().default(true),
  // Batch size handed to getMessages() on every poll
  max_messages: z.number().int().positive().default(10),
});

// Platform blocks stay loosely typed here; each backend validates its own shape.
const PlatformBlockSchema = z.record(z.string(), z.unknown());

const HeraldConfigSchema = z.object({
  general: GeneralSchema.prefault({}),
  platforms: z.record(z.string(), PlatformBlockSchema).default({}),
  monitoring: MonitoringSchema.prefault({}),
});

export type HeraldConfig = z.infer<typeof HeraldConfigSchema>;
export type PlatformConfigMap = HeraldConfig['platforms'];

// ── Environment interpolation ───────────────────────────────────────

const ENV_REF = /\$\{([A-Z0-9_]+)\}/g;

/**
 * Replace `${VAR}` references in every string of a JSON value.
 * Throws a ConfigurationError listing all variables that are unset.
 */
export function interpolateEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  const missing = new Set<string>();

  const walk = (node: unknown): unknown => {
    if (typeof node === 'string') {
      return node.replace(ENV_REF, (_match, name: string) => {
        const resolved = env[name];
        if (resolved === undefined || resolved === '') {
          missing.add(name);
          return '';
        }
        return resolved;
      });
    }
    if (Array.isArray(node)) return node.map(walk);
    if (node && typeof node === 'object') {
      return Object.fromEntries(Object.entries(node).map(([k, v]) => [k, walk(v)]));
    }
    return node;
  };

  const result = walk(value);
  if (missing.size > 0) {
    throw new ConfigurationError(`Missing required environment variable(s): ${[...missing].join(', ')}`);
  }
  return result;
}

function isEnabled(block: Record<string, unknown>): boolean {
  return block.enabled !== false;
}

/**
 * Validate raw config data and resolve environment references.
 *
 * A platform whose credentials reference unset variables is dropped (and
 * logged) when enabled, so the rest of the system still comes up. Disabled
 * platforms keep their raw strings since nothing constructs them.
 */
export function parseHeraldConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): HeraldConfig {
  const result = HeraldConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const { general, monitoring, platforms } = result.data;
  const resolved: PlatformConfigMap = {};

  for (const [name, block] of Object.entries(platforms)) {
    if (!isEnabled(block)) {
      resolved[name] = block;
      continue;
    }
    try {
      resolved[name] = PlatformBlockSchema.parse(interpolateEnv(block, env));
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      logger.error({ platform: name, err: err.message }, 'Platform configuration incomplete — skipping');
    }
  }

  return {
    general: GeneralSchema.parse(interpolateEnv(general, env)),
    monitoring,
    platforms: resolved,
  };
}

/** Read, validate and interpolate the JSON config file at `path`. */
export async function loadHeraldConfig(path: string, env: NodeJS.ProcessEnv = process.env): Promise<HeraldConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseHeraldConfig(raw, env);
}
