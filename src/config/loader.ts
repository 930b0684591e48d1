import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// ── Public API ──────────────────────────────────────────────

export type DocumentFormat = 'yaml' | 'json';

export function formatOf(filePath: string): DocumentFormat {
  return filePath.endsWith('.json') ? 'json' : 'yaml';
}

/** Parse YAML or JSON text without validating its shape. */
export function parseDocument(raw: string, format: DocumentFormat): unknown {
  try {
    return format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Not valid ${format.toUpperCase()}`, { cause: err });
  }
}

/**
 * Parse YAML or JSON text into a validated config.
 * An empty document yields the all-defaults config.
 */
export function parseConfigText(raw: string, format: DocumentFormat): FileConfig {
  const result = fileConfigSchema.safeParse(parseDocument(raw, format) ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Load and validate a `.socflow.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${configPath}`, { cause: err });
  }

  return parseConfigText(raw, formatOf(configPath));
}

/**
 * Like {@link loadConfigFile}, but a missing file means "use defaults".
 */
export async function loadConfigOrDefaults(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return fileConfigSchema.parse({});
    throw new ConfigError(`Cannot read config file ${configPath}`, { cause: err });
  }

  return parseConfigText(raw, formatOf(configPath));
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Read a task file (YAML or JSON). The caller validates its shape. */
export async function loadTaskFile(taskPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(taskPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read task file ${taskPath}`, { cause: err });
  }
  return parseDocument(raw, formatOf(taskPath));
}
