import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

export const CONFIG_FILE_NAME = 'threadline.config.jsonc';

export type AiProviderKind = 'gemini' | 'echo';

interface ServerConfig {
  readonly host: string;
  readonly port: number;
  readonly maxFrameBytes: number;
  readonly outboundQueueCapacity: number;
  readonly socketHighWaterMarkBytes: number;
}

interface TurnsConfig {
  readonly deadlineMs: number | null;
  readonly finalizeAttempts: number;
  readonly defaultLanguage: string;
}

interface StoreConfig {
  readonly path: string;
}

interface UploadsConfig {
  readonly directory: string;
  readonly maxBytes: number;
}

interface AiConfig {
  readonly provider: AiProviderKind;
  readonly model: string;
  readonly baseUrl: string;
  readonly requestTimeoutMs: number;
  readonly cannedResponsesPath: string | null;
}

interface PerfConfig {
  readonly enabled: boolean;
  readonly filePath: string;
}

interface DebugConfig {
  readonly perf: PerfConfig;
}

export interface ThreadlineConfig {
  readonly server: ServerConfig;
  readonly turns: TurnsConfig;
  readonly store: StoreConfig;
  readonly uploads: UploadsConfig;
  readonly ai: AiConfig;
  readonly debug: DebugConfig;
}

export interface LoadedThreadlineConfig {
  readonly filePath: string;
  readonly config: ThreadlineConfig;
  readonly fromLastKnownGood: boolean;
  readonly error: string | null;
}

export const DEFAULT_THREADLINE_CONFIG: ThreadlineConfig = {
  server: {
    host: '127.0.0.1',
    port: 8000,
    maxFrameBytes: 1024 * 1024,
    outboundQueueCapacity: 256,
    socketHighWaterMarkBytes: 1024 * 1024,
  },
  turns: {
    deadlineMs: 120_000,
    finalizeAttempts: 3,
    defaultLanguage: 'English',
  },
  store: {
    path: '.threadline/threads.sqlite',
  },
  uploads: {
    directory: '.threadline/uploads',
    maxBytes: 10 * 1024 * 1024,
  },
  ai: {
    provider: 'gemini',
    model: 'gemini-2.5-flash',
    baseUrl: 'https://generativelanguage.googleapis.com',
    requestTimeoutMs: 120_000,
    cannedResponsesPath: 'data/canned-responses.json',
  },
  debug: {
    perf: {
      enabled: false,
      filePath: '.threadline/perf.jsonl',
    },
  },
};

function stripJsoncComments(text: string): string {
  let output = '';
  let inString = false;
  let inLineComment = false;
  let inBlockComment = false;
  let escaped = false;

  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text.charAt(idx);
    const next = text.charAt(idx + 1);

    if (inLineComment) {
      if (char === '\n') {
        inLineComment = false;
        output += char;
      }
      continue;
    }

    if (inBlockComment) {
      if (char === '*' && next === '/') {
        inBlockComment = false;
        idx += 1;
      }
      continue;
    }

    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '/' && next === '/') {
      inLineComment = true;
      idx += 1;
      continue;
    } else if (char === '/' && next === '*') {
      inBlockComment = true;
      idx += 1;
      continue;
    }
    output += char;
  }

  return output;
}

function stripTrailingCommas(text: string): string {
  let output = '';
  let inString = false;
  let escaped = false;

  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text.charAt(idx);
    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === ',') {
      let lookahead = idx + 1;
      while (lookahead < text.length && /\s/u.test(text.charAt(lookahead))) {
        lookahead += 1;
      }
      const closing = text.charAt(lookahead);
      if (closing === '}' || closing === ']') {
        continue;
      }
    }
    output += char;
  }

  return output;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function normalizeNonEmptyString(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function normalizeIntInRange(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const rounded = Math.floor(value);
  if (rounded < min || rounded > max) {
    return fallback;
  }
  return rounded;
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  return normalizeIntInRange(value, fallback, 1, Number.MAX_SAFE_INTEGER);
}

function normalizeNullablePositiveInt(value: unknown, fallback: number | null): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || Math.floor(value) < 1) {
    return fallback;
  }
  return Math.floor(value);
}

function normalizeNullableString(value: unknown, fallback: string | null): string | null {
  if (value === null) {
    return null;
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    return fallback;
  }
  return value.trim();
}

function normalizeServerConfig(input: unknown): ServerConfig {
  const defaults = DEFAULT_THREADLINE_CONFIG.server;
  const record = asRecord(input);
  if (record === null) {
    return defaults;
  }
  return {
    host: normalizeNonEmptyString(record['host'], defaults.host),
    port: normalizeIntInRange(record['port'], defaults.port, 0, 65535),
    maxFrameBytes: normalizePositiveInt(record['maxFrameBytes'], defaults.maxFrameBytes),
    outboundQueueCapacity: normalizePositiveInt(
      record['outboundQueueCapacity'],
      defaults.outboundQueueCapacity,
    ),
    socketHighWaterMarkBytes: normalizePositiveInt(
      record['socketHighWaterMarkBytes'],
      defaults.socketHighWaterMarkBytes,
    ),
  };
}

function normalizeTurnsConfig(input: unknown): TurnsConfig {
  const defaults = DEFAULT_THREADLINE_CONFIG.turns;
  const record = asRecord(input);
  if (record === null) {
    return defaults;
  }
  return {
    deadlineMs: normalizeNullablePositiveInt(record['deadlineMs'], defaults.deadlineMs),
    finalizeAttempts: normalizeIntInRange(record['finalizeAttempts'], defaults.finalizeAttempts, 1, 10),
    defaultLanguage: normalizeNonEmptyString(record['defaultLanguage'], defaults.defaultLanguage),
  };
}

function normalizeStoreConfig(input: unknown): StoreConfig {
  const record = asRecord(input);
  if (record === null) {
    return DEFAULT_THREADLINE_CONFIG.store;
  }
  return {
    path: normalizeNonEmptyString(record['path'], DEFAULT_THREADLINE_CONFIG.store.path),
  };
}

function normalizeUploadsConfig(input: unknown): UploadsConfig {
  const defaults = DEFAULT_THREADLINE_CONFIG.uploads;
  const record = asRecord(input);
  if (record === null) {
    return defaults;
  }
  return {
    directory: normalizeNonEmptyString(record['directory'], defaults.directory),
    maxBytes: normalizePositiveInt(record['maxBytes'], defaults.maxBytes),
  };
}

function normalizeAiProvider(value: unknown, fallback: AiProviderKind): AiProviderKind {
  if (value === 'gemini' || value === 'echo') {
    return value;
  }
  return fallback;
}

function normalizeAiConfig(input: unknown): AiConfig {
  const defaults = DEFAULT_THREADLINE_CONFIG.ai;
  const record = asRecord(input);
  if (record === null) {
    return defaults;
  }
  return {
    provider: normalizeAiProvider(record['provider'], defaults.provider),
    model: normalizeNonEmptyString(record['model'], defaults.model),
    baseUrl: normalizeNonEmptyString(record['baseUrl'], defaults.baseUrl),
    requestTimeoutMs: normalizePositiveInt(record['requestTimeoutMs'], defaults.requestTimeoutMs),
    cannedResponsesPath: normalizeNullableString(
      record['cannedResponsesPath'],
      defaults.cannedResponsesPath,
    ),
  };
}

function normalizeDebugConfig(input: unknown): DebugConfig {
  const defaults = DEFAULT_THREADLINE_CONFIG.debug;
  const perf = asRecord(asRecord(input)?.['perf']);
  if (perf === null) {
    return defaults;
  }
  return {
    perf: {
      enabled: normalizeBoolean(perf['enabled'], defaults.perf.enabled),
      filePath: normalizeNonEmptyString(perf['filePath'], defaults.perf.filePath),
    },
  };
}

export function parseThreadlineConfigText(text: string): ThreadlineConfig {
  const stripped = stripTrailingCommas(stripJsoncComments(text));
  const parsed: unknown = JSON.parse(stripped);
  const root = asRecord(parsed);
  if (root === null) {
    return DEFAULT_THREADLINE_CONFIG;
  }
  return {
    server: normalizeServerConfig(root['server']),
    turns: normalizeTurnsConfig(root['turns']),
    store: normalizeStoreConfig(root['store']),
    uploads: normalizeUploadsConfig(root['uploads']),
    ai: normalizeAiConfig(root['ai']),
    debug: normalizeDebugConfig(root['debug']),
  };
}

function parseBooleanEnv(value: string | undefined): boolean | null {
  if (typeof value !== 'string') {
    return null;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }
  return null;
}

/** Applies `THREADLINE_HOST`, `THREADLINE_PORT` and `THREADLINE_PERF_ENABLED`. */
export function applyEnvironmentOverrides(
  config: ThreadlineConfig,
  env: NodeJS.ProcessEnv = process.env,
): ThreadlineConfig {
  const host = env.THREADLINE_HOST?.trim();
  const portRaw = env.THREADLINE_PORT?.trim();
  const port = portRaw === undefined || portRaw.length === 0 ? Number.NaN : Number(portRaw);
  const perfEnabled = parseBooleanEnv(env.THREADLINE_PERF_ENABLED);
  return {
    ...config,
    server: {
      ...config.server,
      ...(host !== undefined && host.length > 0 ? { host } : {}),
      ...(Number.isInteger(port) && port >= 0 && port <= 65535 ? { port } : {}),
    },
    debug: {
      perf: {
        ...config.debug.perf,
        ...(perfEnabled !== null ? { enabled: perfEnabled } : {}),
      },
    },
  };
}

export function resolveConfigPath(cwd: string): string {
  return resolve(cwd, CONFIG_FILE_NAME);
}

export function loadThreadlineConfig(options?: {
  cwd?: string;
  filePath?: string;
  lastKnownGood?: ThreadlineConfig;
}): LoadedThreadlineConfig {
  const cwd = options?.cwd ?? process.cwd();
  const filePath = options?.filePath ?? resolveConfigPath(cwd);
  const lastKnownGood = options?.lastKnownGood ?? DEFAULT_THREADLINE_CONFIG;

  if (!existsSync(filePath)) {
    return {
      filePath,
      config: lastKnownGood,
      fromLastKnownGood: false,
      error: null,
    };
  }

  try {
    const raw = readFileSync(filePath, 'utf8');
    return {
      filePath,
      config: parseThreadlineConfigText(raw),
      fromLastKnownGood: false,
      error: null,
    };
  } catch (error: unknown) {
    return {
      filePath,
      config: lastKnownGood,
      fromLastKnownGood: true,
      error: String(error),
    };
  }
}
