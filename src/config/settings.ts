import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_PRICING, LogLevelSchema, SettingsSchema, type Price, type Settings } from '../schemas/index.js';
import { ConfigurationError, InvalidInputError } from '../utils/errors.js';

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export interface Credentials {
  notionToken: string;
  geminiApiKey: string;
}

/**
 * Process-wide configuration. Loaded once at startup, frozen, and passed
 * explicitly to every component that needs it.
 */
export interface AppConfig {
  settingsPath: string;
  settings: DeepReadonly<Settings>;
  pricing: Readonly<Record<string, Price>>;
  credentials: Partial<Credentials>;
}

export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env['NOTION_RAG_SETTINGS'] ?? path.resolve(process.cwd(), 'settings.json');
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

async function readSettingsFile(settingsPath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(settingsPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`Cannot read settings file ${settingsPath}`);
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Settings file ${settingsPath} is not valid JSON`);
  }
}

export function parseSettings(raw: unknown, source = 'settings'): Settings {
  const result = SettingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid ${source}: ${issues.join('; ')}`);
  }
  return result.data;
}

export function buildConfig(settings: Settings, settingsPath: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const credentials: Partial<Credentials> = {};
  if (env['NOTION_TOKEN']) credentials.notionToken = env['NOTION_TOKEN'];
  if (env['GEMINI_API_KEY']) credentials.geminiApiKey = env['GEMINI_API_KEY'];

  const envLevel = LogLevelSchema.safeParse(env['LOG_LEVEL']);
  const pricing: Record<string, Price> = {};
  for (const [model, [input, output]] of Object.entries(DEFAULT_PRICING)) {
    pricing[model] = [input, output];
  }

  const config: AppConfig = {
    settingsPath,
    settings: {
      ...settings,
      logLevel: envLevel.success ? envLevel.data : settings.logLevel,
    },
    pricing: { ...pricing, ...settings.pricing },
    credentials,
  };
  return deepFreeze(config);
}

/** Rotating log file shared by the service, sync runs and the HTTP API. */
export function logFilePath(config: AppConfig): string {
  return path.join(path.resolve(config.settings.logDir), 'notion-rag.log');
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const settingsPath = defaultSettingsPath(env);
  const settings = parseSettings(await readSettingsFile(settingsPath), settingsPath);
  return buildConfig(settings, settingsPath, env);
}

export function requireCredential<K extends keyof Credentials>(config: AppConfig, key: K): string {
  const value = config.credentials[key];
  if (!value) {
    const envName = key === 'notionToken' ? 'NOTION_TOKEN' : 'GEMINI_API_KEY';
    throw new ConfigurationError(`${envName} environment variable is not set`);
  }
  return value;
}

/**
 * Resolve a registered database label. With no label, the single registered
 * database is chosen; anything else is an input error listing what exists.
 */
export function resolveDatabase(
  databases: Readonly<Record<string, string>>,
  label?: string | null
): { label: string; url: string } {
  const labels = Object.keys(databases).sort();

  if (label) {
    const url = databases[label];
    if (url === undefined) {
      const available = labels.length > 0 ? labels.join(', ') : '(none)';
      throw new InvalidInputError(`Unknown database label '${label}'. Available labels: ${available}`);
    }
    return { label, url };
  }

  const [only] = labels;
  if (labels.length === 1 && only !== undefined) {
    return { label: only, url: databases[only] ?? '' };
  }
  if (labels.length === 0) {
    throw new InvalidInputError("No databases registered. Run 'init <name> <url>' first.");
  }
  throw new InvalidInputError(`Multiple databases registered. Specify one: ${labels.join(', ')}`);
}

/** Persist a label → database URL entry, keeping every other key of the file as it is. */
export async function saveDatabase(settingsPath: string, label: string, url: string): Promise<Record<string, string>> {
  const raw = await readSettingsFile(settingsPath);
  const current = raw !== null && typeof raw === 'object' ? { ...raw } : {};
  const existing = 'databases' in current && current.databases !== null && typeof current.databases === 'object'
    ? current.databases
    : {};
  const databases: Record<string, string> = {};
  for (const [key, value] of Object.entries(existing)) {
    if (typeof value === 'string') databases[key] = value;
  }
  databases[label] = url;

  await fs.mkdir(path.dirname(settingsPath), { recursive: true });
  await fs.writeFile(settingsPath, `${JSON.stringify({ ...current, databases }, null, 2)}\n`, 'utf8');
  return databases;
}
