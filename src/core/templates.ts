import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

import { createLogger } from '../middleware/logger.js';

const logger = createLogger({ component: 'templates' });

export interface Template {
  name: string;
  /** Body with `{name}` placeholders. `{{` and `}}` are literal braces. */
  content: string;
  tags: string[];
  category: string;
}

export type TemplateParams = Record<string, unknown>;

export class TemplateNotFoundError extends Error {
  constructor(readonly templateName: string) {
    super(`Template not found: ${templateName}`);
    this.name = 'TemplateNotFoundError';
  }
}

/** Brace text that is neither a plain `{name}` placeholder nor an escaped brace. */
export class TemplateSyntaxError extends Error {
  constructor(readonly fragment: string) {
    super(`Malformed template placeholder: ${fragment}`);
    this.name = 'TemplateSyntaxError';
  }
}

export class MissingTemplateParameterError extends Error {
  constructor(readonly parameter: string) {
    super(`Missing template parameter: ${parameter}`);
    this.name = 'MissingTemplateParameterError';
  }
}

// ── Formatting ──────────────────────────────────────────────────────

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Substitute named placeholders. Any other brace text (format specs,
 * conversions, unbalanced braces) throws TemplateSyntaxError, and the first
 * placeholder whose key is absent from `params` throws
 * MissingTemplateParameterError, so callers never see partially formatted
 * text.
 */
export function formatTemplate(content: string, params: TemplateParams): string {
  return content.replace(TOKEN, (token, field: string | undefined) => {
    if (token === '{{') return '{';
    if (token === '}}') return '}';
    if (field === undefined || !IDENTIFIER.test(field)) throw new TemplateSyntaxError(token);
    if (!Object.hasOwn(params, field) || params[field] === undefined) {
      throw new MissingTemplateParameterError(field);
    }
    return String(params[field]);
  });
}

// ── Persistence ─────────────────────────────────────────────────────

const TemplateFileSchema = z.record(
  z.string(),
  z.object({
    content: z.string(),
    tags: z.array(z.string()).default([]),
    category: z.string().default('general'),
  }),
);

export const DEFAULT_TEMPLATES: readonly Template[] = [
  {
    name: 'emergence',
    content: 'Herald is online.\n\n'
      + 'One voice, every channel: announcements from this account are now\n'
      + 'mirrored across all of our connected platforms.\n\n'
      + '#Herald #HelloWorld',
    tags: ['emergence', 'introduction'],
    category: 'identity',
  },
  {
    name: 'manifesto',
    content: 'Why we broadcast:\n'
      + 'to reach people where they already are,\n'
      + 'to say the same thing everywhere,\n'
      + 'and to listen as much as we speak.\n\n'
      + '#Herald #OpenCommunication',
    tags: ['manifesto', 'mission'],
    category: 'mission',
  },
];

function toFileShape(templates: Iterable<Template>): Record<string, Omit<Template, 'name'>> {
  const out: Record<string, Omit<Template, 'name'>> = {};
  for (const t of templates) {
    out[t.name] = { content: t.content, tags: [...t.tags], category: t.category };
  }
  return out;
}

/**
 * Templates keyed by name, backed by a JSON file.
 *
 * A missing or unreadable file is replaced by the built-in defaults, which
 * are written back so later runs have something to edit.
 */
export class TemplateStore {
  private templates = new Map<string, Template>();

  constructor(readonly path: string) {}

  async load(): Promise<Map<string, Template>> {
    try {
      const raw = JSON.parse(await readFile(this.path, 'utf-8'));
      const parsed = TemplateFileSchema.parse(raw);
      this.templates = new Map(
        Object.entries(parsed).map(([name, t]) => [name, { name, ...t }]),
      );
      logger.info({ path: this.path, count: this.templates.size }, 'Templates loaded');
    } catch (err) {
      const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
      if (missing) {
        logger.info({ path: this.path }, 'No template file — bootstrapping defaults');
      } else {
        logger.error({ err, path: this.path }, 'Failed to load templates — falling back to defaults');
      }
      this.templates = new Map(DEFAULT_TEMPLATES.map((t) => [t.name, { ...t, tags: [...t.tags] }]));
      await this.persistDefaults();
    }
    return new Map(this.templates);
  }

  get(name: string): Template | undefined {
    return this.templates.get(name);
  }

  names(): string[] {
    return [...this.templates.keys()];
  }

  /** Add or replace a template in memory. Call save() to persist. */
  set(template: Template): void {
    this.templates.set(template.name, { ...template, tags: [...template.tags] });
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(toFileShape(this.templates.values()), null, 2)}\n`, 'utf-8');
  }

  /**
   * Resolve and format a template. Throws TemplateNotFoundError,
   * TemplateSyntaxError or MissingTemplateParameterError.
   */
  render(name: string, params: TemplateParams): { template: Template; content: string } {
    const template = this.templates.get(name);
    if (!template) throw new TemplateNotFoundError(name);
    return { template, content: formatTemplate(template.content, params) };
  }

  private async persistDefaults(): Promise<void> {
    try {
      await this.save();
    } catch (err) {
      logger.warn({ err, path: this.path }, 'Could not persist default templates');
    }
  }
}
