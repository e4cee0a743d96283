import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  createCannedResponseClient,
  createEchoStreamClient,
  createGeminiStreamClient,
  loadCannedResponses,
} from '../packages/chat-ai/src/index.ts';
import { SqliteThreadStore, type AiStreamClient } from '../packages/chat-core/src/index.ts';
import {
  applyEnvironmentOverrides,
  loadThreadlineConfig,
  type ThreadlineConfig,
} from '../src/config/config-core.ts';
import { resolveRuntimeDirectory, resolveRuntimePath } from '../src/config/runtime-paths.ts';
import { loadSecrets } from '../src/config/secrets-core.ts';
import {
  configurePerfCore,
  recordPerfEvent,
  shutdownPerfCore,
  startPerfSpan,
} from '../src/perf/perf-core.ts';
import { startChatServer } from '../src/server/chat-server.ts';
import { ImageUploadStore } from '../src/server/image-uploads.ts';

function resolveInvocationDirectory(): string {
  return process.env.THREADLINE_INVOKE_CWD ?? process.env.INIT_CWD ?? process.cwd();
}

function configureProcessPerf(invocationDirectory: string, config: ThreadlineConfig): void {
  const envPath = process.env.THREADLINE_PERF_FILE_PATH;
  const perfFilePath = resolveRuntimePath(
    invocationDirectory,
    typeof envPath === 'string' && envPath.trim().length > 0 ? envPath : config.debug.perf.filePath,
  );
  configurePerfCore({
    enabled: config.debug.perf.enabled,
    filePath: perfFilePath,
  });
  recordPerfEvent('server.perf.configured', {
    process: 'server',
    enabled: config.debug.perf.enabled,
    filePath: perfFilePath,
  });
}

function createAiClient(
  invocationDirectory: string,
  config: ThreadlineConfig,
  uploads: ImageUploadStore,
): AiStreamClient {
  const apiKey = process.env.GEMINI_API_KEY?.trim() ?? '';
  let base: AiStreamClient;
  if (config.ai.provider === 'gemini' && apiKey.length > 0) {
    base = createGeminiStreamClient({
      apiKey,
      model: config.ai.model,
      baseUrl: config.ai.baseUrl,
      requestTimeoutMs: config.ai.requestTimeoutMs,
      resolveImage: (imageRef) => uploads.resolveInlineImage(imageRef),
    });
  } else {
    if (config.ai.provider === 'gemini') {
      process.stdout.write('[threadline] GEMINI_API_KEY is not set; replies will echo the prompt\n');
    }
    base = createEchoStreamClient();
  }

  if (config.ai.cannedResponsesPath === null) {
    return base;
  }
  const cannedPath = resolve(invocationDirectory, config.ai.cannedResponsesPath);
  if (!existsSync(cannedPath)) {
    return base;
  }
  return createCannedResponseClient({
    responses: loadCannedResponses(cannedPath),
    fallback: base,
  });
}

async function main(): Promise<number> {
  const invocationDirectory = resolveInvocationDirectory();
  const secrets = loadSecrets({ cwd: invocationDirectory });
  const loadedConfig = loadThreadlineConfig({ cwd: invocationDirectory });
  if (loadedConfig.error !== null) {
    process.stdout.write(
      `[threadline] config error, using defaults: ${loadedConfig.error} (${loadedConfig.filePath})\n`,
    );
  }
  const config = applyEnvironmentOverrides(loadedConfig.config, process.env);
  configureProcessPerf(invocationDirectory, config);

  const startupSpan = startPerfSpan('server.startup.total', { process: 'server' });
  const runtimeDirectory = resolveRuntimeDirectory(invocationDirectory, process.env);
  const storePath = resolveRuntimePath(invocationDirectory, config.store.path);
  const uploadsDirectory = resolveRuntimePath(invocationDirectory, config.uploads.directory);
  process.stdout.write(
    `[threadline] boot pid=${String(process.pid)} runtimeRoot=${runtimeDirectory} config=${loadedConfig.filePath} db=${storePath} secrets=${secrets.loaded ? secrets.filePath : 'none'}\n`,
  );

  const store = new SqliteThreadStore(storePath);
  const uploads = new ImageUploadStore({
    directory: uploadsDirectory,
    maxBytes: config.uploads.maxBytes,
  });
  const aiClient = createAiClient(invocationDirectory, config, uploads);

  const server = await startChatServer({
    host: config.server.host,
    port: config.server.port,
    store,
    aiClient,
    uploads,
    maxFrameBytes: config.server.maxFrameBytes,
    outboundQueueCapacity: config.server.outboundQueueCapacity,
    socketHighWaterMarkBytes: config.server.socketHighWaterMarkBytes,
    turnDeadlineMs: config.turns.deadlineMs,
    finalizeAttempts: config.turns.finalizeAttempts,
    defaultLanguage: config.turns.defaultLanguage,
  });

  const address = server.address();
  recordPerfEvent('server.startup.listening', {
    process: 'server',
    host: address.address,
    port: address.port,
    aiClient: aiClient.name,
  });
  startupSpan.end({ listening: true });
  process.stdout.write(
    `[threadline] listening host=${address.address} port=${String(address.port)} ai=${aiClient.name} uploads=${uploadsDirectory}\n`,
  );

  let resolveStop: (() => void) | null = null;
  const stopPromise = new Promise<void>((resolve) => {
    resolveStop = resolve;
  });
  const requestStop = (): void => {
    resolveStop?.();
  };
  process.once('SIGINT', requestStop);
  process.once('SIGTERM', requestStop);

  await stopPromise;
  recordPerfEvent('server.runtime.stop-requested', { process: 'server' });
  process.stdout.write('[threadline] shutting down\n');
  await server.close();
  store.close();
  recordPerfEvent('server.runtime.closed', { process: 'server' });
  return 0;
}

try {
  process.exitCode = await main();
} catch (error: unknown) {
  process.stderr.write(
    `threadline fatal error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`,
  );
  process.exitCode = 1;
} finally {
  shutdownPerfCore();
}
