import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const OUTPUT_FORMATS = ['text', 'json', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ConfigSchema = z
  .object({
    domains: z.array(z.string().min(1)).default([]),
    format: z.enum(OUTPUT_FORMATS).default('text'),
    includePassing: z.boolean().default(false),
    logLevel: LogLevelSchema.default('info'),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/** Level named by an environment variable, or undefined when it is unset or blank. */
export function readLogLevel(value: string | undefined, source = 'LOG_LEVEL'): LogLevel | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = LogLevelSchema.safeParse(value.trim());
  if (!parsed.success) {
    throw new ConfigError(`${source} must be one of ${LogLevelSchema.options.join(', ')}; got "${value}"`);
  }
  return parsed.data;
}

export function parseConfig(content: string, source = 'config'): Config {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    throw new ConfigError(`${source} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`${source} is invalid: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function loadConfig(configPath?: string): Config {
  if (!configPath) {
    return DEFAULT_CONFIG;
  }

  const full = path.resolve(configPath);
  if (!fs.existsSync(full)) {
    throw new ConfigError(`Config file not found: ${full}`);
  }
  return parseConfig(fs.readFileSync(full, 'utf-8'), full);
}
