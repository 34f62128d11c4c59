import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export const DEFAULT_CONFIG_PATH = 'site-query.config.json';

export const ConfigSchema = z
  .object({
    startUrl: z.string().url().optional(),
    maxPages: z.number().int().min(1).max(50).optional(),
    delayMs: z.number().int().nonnegative().optional(),
    timeoutMs: z.number().int().positive().optional(),
    userAgent: z.string().min(1).optional(),
  })
  .strict();

export type SiteQueryConfig = z.infer<typeof ConfigSchema>;

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<SiteQueryConfig> {
  const full = path.resolve(configPath);
  if (!existsSync(full)) return {};
  const raw = await readFile(full, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Invalid JSON in ${configPath}: ${detail}`);
  }

  const result = ConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid config ${configPath}: ${issues}`);
  }
  return result.data;
}
