import { isAbsolute, resolve } from 'node:path';

export const RUNTIME_RELATIVE_ROOT = '.threadline';

function readNonEmptyEnvPath(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  return trimmed;
}

function resolveHomePath(pathValue: string, env: NodeJS.ProcessEnv): string | null {
  const homeDirectory = readNonEmptyEnvPath(env.HOME);
  if (homeDirectory === null) {
    return null;
  }
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return null;
}

/** Root for sqlite, uploads, secrets and perf output; `THREADLINE_HOME` overrides it. */
export function resolveRuntimeDirectory(
  invocationDirectory: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = readNonEmptyEnvPath(env.THREADLINE_HOME);
  if (override !== null) {
    return resolveHomePath(override, env) ?? resolve(invocationDirectory, override);
  }
  return resolve(invocationDirectory, RUNTIME_RELATIVE_ROOT);
}

/**
 * Resolves a configured path. Paths under `.threadline/` move with the runtime directory,
 * `~/` expands to HOME, and anything else is relative to the invocation directory.
 */
export function resolveRuntimePath(
  invocationDirectory: string,
  pathValue: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const normalizedPath = pathValue.trim();
  const runtimeDirectory = resolveRuntimeDirectory(invocationDirectory, env);
  if (normalizedPath.length === 0 || normalizedPath === RUNTIME_RELATIVE_ROOT) {
    return runtimeDirectory;
  }
  if (normalizedPath.startsWith(`${RUNTIME_RELATIVE_ROOT}/`)) {
    return resolve(runtimeDirectory, normalizedPath.slice(RUNTIME_RELATIVE_ROOT.length + 1));
  }
  const homePath = resolveHomePath(normalizedPath, env);
  if (homePath !== null) {
    return homePath;
  }
  if (isAbsolute(normalizedPath)) {
    return normalizedPath;
  }
  return resolve(invocationDirectory, normalizedPath);
}
