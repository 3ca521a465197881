import fs from 'fs';
import path from 'path';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { InstanceTarget, OrchestratorError, VenueName, normalizePairList } from '@venuepilot/shared';
import { deepMerge, isPlainRecord, normalizeBaseUrl, PlainRecord } from '@venuepilot/util';
import { configSchema, OrchestratorConfig, watchlistSchema } from './schema';

export type {
  OrchestratorConfig,
  TelegramConfig,
  DefaultsConfig,
  ExternalStatusConfig,
  InstanceConfig,
  Watchlist
} from './schema';
export { configSchema, watchlistSchema } from './schema';

let cachedConfig: OrchestratorConfig | null = null;

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config', 'config.yml');
export const DEFAULT_WATCHLIST_PATH = path.resolve(process.cwd(), 'config', 'watchlist.yml');

type EnvCaster = (value: string) => unknown;

type EnvMapping = [path: string, envKey: string, caster: EnvCaster];

function parseIdList(value: string): number[] {
  return value
    .split(/[\s,;]+/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => Number(part))
    .filter((num) => Number.isInteger(num));
}

const asBool: EnvCaster = (v) => v === 'true' || v === '1';

const envMap: EnvMapping[] = [
  ['logging.level', 'LOG_LEVEL', (v) => v],
  ['telegram.token', 'TELEGRAM_BOT_TOKEN', (v) => v],
  ['telegram.chat_id', 'TELEGRAM_CHAT_ID', (v) => v],
  ['telegram.topic_id', 'TELEGRAM_TOPIC_ID', (v) => v],
  ['telegram.admins', 'TELEGRAM_ADMINS', parseIdList],
  ['telegram.require_arm', 'REQUIRE_ARM', asBool],
  ['telegram.arm_ttl_minutes', 'ARM_TTL_MINUTES', (v) => Number(v)],
  ['freqtrade.long.base_url', 'FT_LONG_URL', (v) => v],
  ['freqtrade.long.user', 'FT_LONG_USER', (v) => v],
  ['freqtrade.long.pass', 'FT_LONG_PASS', (v) => v],
  ['freqtrade.short.base_url', 'FT_SHORT_URL', (v) => v],
  ['freqtrade.short.user', 'FT_SHORT_USER', (v) => v],
  ['freqtrade.short.pass', 'FT_SHORT_PASS', (v) => v],
  ['defaults.stake', 'DEFAULT_STAKE', (v) => Number(v)],
  ['defaults.delay_ms', 'DEFAULT_DELAY_MS', (v) => Number(v)],
  ['external_status.enabled', 'AUTO_TOGGLE_ENABLED', asBool],
  ['external_status.url', 'EXTERNAL_STATUS_URL', (v) => v],
  ['server.port', 'SERVER_PORT', (v) => Number(v)],
  ['server.enabled', 'SERVER_ENABLED', asBool],
  ['persistence.sqlitePath', 'SQLITE_DB_PATH', (v) => v]
];

function setPath(target: PlainRecord, dottedKey: string, value: unknown): void {
  const segments = dottedKey.split('.');
  let cursor = target;
  for (const segment of segments.slice(0, -1)) {
    const next = cursor[segment];
    if (isPlainRecord(next)) {
      cursor = next;
    } else {
      const created: PlainRecord = {};
      cursor[segment] = created;
      cursor = created;
    }
  }
  cursor[segments[segments.length - 1]] = value;
}

function configInvalid(message: string, detail: Record<string, unknown>, cause?: unknown): OrchestratorError {
  return new OrchestratorError('ConfigInvalid', message, { detail, cause });
}

function formatIssues(err: ZodError): string[] {
  return err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function readYamlDocument(filePath: string, label: string): PlainRecord {
  if (!fs.existsSync(filePath)) {
    throw configInvalid(`${label} not found at ${filePath}`, { path: filePath });
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw configInvalid(`${label} at ${filePath} is not valid YAML`, { path: filePath }, err);
  }
  if (!isPlainRecord(parsed)) {
    throw configInvalid(`${label} at ${filePath} must be a mapping`, { path: filePath });
  }
  return parsed;
}

function applyEnv(raw: PlainRecord, env: NodeJS.ProcessEnv): PlainRecord {
  const mutated = deepMerge({}, raw);
  for (const [pathKey, envKey, caster] of envMap) {
    const envVal = env[envKey];
    if (envVal !== undefined && envVal !== '') {
      setPath(mutated, pathKey, caster(envVal));
    }
  }
  return mutated;
}

export type LoadConfigOptions = {
  forceReload?: boolean;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadConfig(options: LoadConfigOptions = {}): OrchestratorConfig {
  if (!options.forceReload && cachedConfig) {
    return cachedConfig;
  }
  const env = options.env ?? process.env;
  const pathToUse = options.configPath ?? env.VENUEPILOT_CONFIG ?? DEFAULT_CONFIG_PATH;
  const fileConfig = readYamlDocument(pathToUse, 'config file');
  const result = configSchema.safeParse(applyEnv(fileConfig, env));
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw configInvalid(`config file ${pathToUse} is invalid: ${issues.join('; ')}`, { path: pathToUse, issues });
  }
  cachedConfig = result.data;
  return result.data;
}

/** The cached config, without loading it; `null` before the first successful `loadConfig`. */
export function peekConfig(): OrchestratorConfig | null {
  return cachedConfig;
}

export function resolveWatchlistPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.VENUEPILOT_WATCHLIST ?? DEFAULT_WATCHLIST_PATH;
}

export function loadWatchlist(filePath: string = resolveWatchlistPath()): string[] {
  const doc = readYamlDocument(filePath, 'watchlist');
  const result = watchlistSchema.safeParse(doc);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw configInvalid(`watchlist ${filePath} is invalid: ${issues.join('; ')}`, { path: filePath, issues });
  }
  const normalized = normalizePairList(result.data.basket);
  if (!normalized.ok) {
    throw configInvalid(`watchlist ${filePath} has a malformed pair: ${normalized.invalid}`, {
      path: filePath,
      pair: normalized.invalid
    });
  }
  return normalized.pairs;
}

/** Writes through a temp file and renames it, so readers never see a half-written document. */
export async function saveWatchlist(pairs: readonly string[], filePath: string = resolveWatchlistPath()): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(tmpPath, YAML.stringify({ basket: [...pairs] }), { encoding: 'utf-8', mode: 0o600 });
  await fs.promises.rename(tmpPath, filePath);
}

export function buildInstanceTargets(config: OrchestratorConfig): Readonly<Record<VenueName, InstanceTarget>> {
  const toTarget = (name: VenueName): InstanceTarget => {
    const instance = config.freqtrade[name];
    return Object.freeze({
      name,
      baseUrl: normalizeBaseUrl(instance.base_url),
      credentials: Object.freeze({ username: instance.user, password: instance.pass })
    });
  };
  return Object.freeze({ long: toTarget('long'), short: toTarget('short') });
}
