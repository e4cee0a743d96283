import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { resolveRuntimeDirectory } from './runtime-paths.ts';

export const SECRETS_FILE_NAME = 'secrets.env';

interface SecretEntry {
  readonly key: string;
  readonly value: string;
}

interface LoadSecretsOptions {
  readonly cwd?: string;
  readonly filePath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrideExisting?: boolean;
}

export interface LoadedSecrets {
  readonly filePath: string;
  readonly loaded: boolean;
  readonly loadedKeys: readonly string[];
  readonly skippedKeys: readonly string[];
}

function isValidSecretKey(value: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/u.test(value);
}

const DOUBLE_QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
};

function decodeDoubleQuotedValue(raw: string): string {
  let out = '';
  for (let index = 0; index < raw.length; index += 1) {
    const char = raw.charAt(index);
    if (char !== '\\' || index + 1 >= raw.length) {
      out += char;
      continue;
    }
    const escaped = raw.charAt(index + 1);
    out += DOUBLE_QUOTED_ESCAPES[escaped] ?? `\\${escaped}`;
    index += 1;
  }
  return out;
}

function assertNoTrailingContent(trailing: string, lineNumber: number): void {
  if (!/^\s*(#.*)?$/u.test(trailing)) {
    throw new Error(`unexpected trailing content on line ${String(lineNumber)}`);
  }
}

function parseLineValue(rawValue: string, lineNumber: number): string {
  if (rawValue.startsWith('"')) {
    let escaped = false;
    for (let index = 1; index < rawValue.length; index += 1) {
      const char = rawValue.charAt(index);
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        assertNoTrailingContent(rawValue.slice(index + 1), lineNumber);
        return decodeDoubleQuotedValue(rawValue.slice(1, index));
      }
    }
    throw new Error(`unterminated double-quoted value on line ${String(lineNumber)}`);
  }
  if (rawValue.startsWith("'")) {
    const closingIndex = rawValue.indexOf("'", 1);
    if (closingIndex < 0) {
      throw new Error(`unterminated single-quoted value on line ${String(lineNumber)}`);
    }
    assertNoTrailingContent(rawValue.slice(closingIndex + 1), lineNumber);
    return rawValue.slice(1, closingIndex);
  }
  return rawValue.replace(/\s+#.*$/u, '').trim();
}

function parseSecretLine(line: string, lineNumber: number): SecretEntry | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return null;
  }
  const withoutExport = trimmed.startsWith('export ')
    ? trimmed.slice('export '.length).trimStart()
    : trimmed;
  const equalIndex = withoutExport.indexOf('=');
  if (equalIndex <= 0) {
    throw new Error(`invalid secret entry on line ${String(lineNumber)}: expected KEY=VALUE`);
  }
  const key = withoutExport.slice(0, equalIndex).trim();
  if (!isValidSecretKey(key)) {
    throw new Error(`invalid secret key on line ${String(lineNumber)}: ${key}`);
  }
  return {
    key,
    value: parseLineValue(withoutExport.slice(equalIndex + 1).trim(), lineNumber),
  };
}

export function parseSecretsText(text: string): Readonly<Record<string, string>> {
  const entries: Record<string, string> = {};
  text.split(/\r?\n/u).forEach((line, index) => {
    const parsed = parseSecretLine(line, index + 1);
    if (parsed !== null) {
      entries[parsed.key] = parsed.value;
    }
  });
  return entries;
}

export function resolveSecretsPath(
  cwd: string,
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (typeof filePath === 'string' && filePath.trim().length > 0) {
    return resolve(cwd, filePath);
  }
  return resolve(resolveRuntimeDirectory(cwd, env), SECRETS_FILE_NAME);
}

/** Copies secrets into `env`; keys already present stay untouched unless `overrideExisting`. */
export function loadSecrets(options: LoadSecretsOptions = {}): LoadedSecrets {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const filePath = resolveSecretsPath(cwd, options.filePath, env);
  const overrideExisting = options.overrideExisting ?? false;
  if (!existsSync(filePath)) {
    return {
      filePath,
      loaded: false,
      loadedKeys: [],
      skippedKeys: [],
    };
  }
  const parsed = parseSecretsText(readFileSync(filePath, 'utf8'));
  const loadedKeys: string[] = [];
  const skippedKeys: string[] = [];
  for (const [key, value] of Object.entries(parsed)) {
    if (!overrideExisting && Object.prototype.hasOwnProperty.call(env, key)) {
      skippedKeys.push(key);
      continue;
    }
    env[key] = value;
    loadedKeys.push(key);
  }
  return {
    filePath,
    loaded: true,
    loadedKeys,
    skippedKeys,
  };
}
