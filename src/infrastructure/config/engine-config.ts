import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Service configuration loaded from YAML.
 */
export interface EngineConfig {
  server: { host: string; port: number; log_level: string };
  engine: { program_cache_size: number; disabled_rules: string[] };
}

/**
 * Default configuration: listen on all interfaces, cache up to 1000
 * checked expressions, no rule disabled.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  server: { host: '0.0.0.0', port: 3000, log_level: 'info' },
  engine: { program_cache_size: 1000, disabled_rules: [] },
};

/**
 * Minimal YAML parser for the two-level config structure.
 *
 * Handles only the subset of YAML used in config/engine.yaml:
 * top-level keys with indented scalar and array values.
 */
function parseSimpleYaml(content: string): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  let currentSection: Record<string, unknown> | null = null;
  let lastKey = '';

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trim().startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t') && line.includes(':')) {
      const section: Record<string, unknown> = {};
      result[line.slice(0, line.indexOf(':')).trim()] = section;
      currentSection = section;
      lastKey = '';
      continue;
    }

    if (currentSection === null) continue;

    // Array item under the last key: "    - item"
    if (line.trim().startsWith('- ')) {
      const items = currentSection[lastKey];
      if (Array.isArray(items)) {
        items.push(parseScalar(line.trim().slice(2).trim()));
      }
      continue;
    }

    // Indented key-value under current section
    if (line.includes(':')) {
      const colonIdx = line.indexOf(':');
      const key = line.slice(0, colonIdx).trim();
      const raw = line.slice(colonIdx + 1).trim();
      // "key:" with nothing after it opens a block list
      currentSection[key] = raw === '' ? [] : parseScalar(raw);
      lastKey = key;
    }
  }

  return result;
}

function parseScalar(value: string): unknown {
  if (value === '[]') return [];
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === '""' || value === "''") return '';
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

function stringList(value: unknown): string[] | null {
  if (!Array.isArray(value)) return null;
  return value.map((item: unknown) => String(item));
}

/**
 * Loads the service configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Merges loaded values over defaults so missing keys get default values.
 */
export function loadEngineConfig(
  configPath?: string,
): EngineConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'engine.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return {
      server: { ...DEFAULT_CONFIG.server },
      engine: { ...DEFAULT_CONFIG.engine, disabled_rules: [...DEFAULT_CONFIG.engine.disabled_rules] },
    };
  }

  const parsed = parseSimpleYaml(content);
  const server = parsed['server'] ?? {};
  const engine = parsed['engine'] ?? {};

  const cacheSize = engine['program_cache_size'];
  const port = server['port'];

  return {
    server: {
      host: typeof server['host'] === 'string' ? server['host'] : DEFAULT_CONFIG.server.host,
      port: typeof port === 'number' && Number.isInteger(port) ? port : DEFAULT_CONFIG.server.port,
      log_level: typeof server['log_level'] === 'string' ? server['log_level'] : DEFAULT_CONFIG.server.log_level,
    },
    engine: {
      program_cache_size: typeof cacheSize === 'number' && Number.isInteger(cacheSize) && cacheSize >= 0
        ? cacheSize
        : DEFAULT_CONFIG.engine.program_cache_size,
      disabled_rules: stringList(engine['disabled_rules']) ?? [...DEFAULT_CONFIG.engine.disabled_rules],
    },
  };
}

/**
 * Applies HOST, PORT and LOG_LEVEL from the environment over a loaded config.
 */
export function applyEnvOverrides(config: EngineConfig, env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const port = Number(env['PORT'] ?? config.server.port);
  return {
    ...config,
    server: {
      host: env['HOST'] ?? config.server.host,
      port: Number.isInteger(port) && port > 0 ? port : config.server.port,
      log_level: env['LOG_LEVEL'] ?? config.server.log_level,
    },
  };
}
