#!/usr/bin/env node
import { loadConfig, isDevelopment, AppConfig } from './config/env.js';
import { createLogger, Logger } from './core/observability/logger.js';
import { DownloadMetrics } from './core/observability/metrics.js';
import { ConfigurationError, describeError, isHlsError } from './core/errors.js';
import { AxiosHttpClient } from './core/http/axios-http.client.js';
import { Aes128CbcDecryptor } from './core/crypto/aes128.decryptor.js';
import { KeyCache } from './core/keys/key-cache.js';
import { HlsDownloader } from './core/downloader/hls-downloader.service.js';
import { sanitizeUrlForLogging } from './utils/url.js';

const USAGE = 'Usage: hls-fetch <playlist-url> [output-file]';

/**
 * Argumentos posicionales: URL de la playlist y archivo de salida. Tienen
 * prioridad sobre SOURCE_URL y OUTPUT_PATH.
 */
function resolveTarget(config: AppConfig, argv: readonly string[]): { url: string; output: string } {
  const [urlArg, outputArg] = argv;
  const url = urlArg ?? config.SOURCE_URL;
  if (!url) {
    throw new ConfigurationError(`No playlist URL given. ${USAGE}`, 'SOURCE_URL');
  }
  return { url, output: outputArg ?? config.OUTPUT_PATH };
}

async function run(config: AppConfig, logger: Logger, argv: readonly string[]): Promise<void> {
  const { url, output } = resolveTarget(config, argv);

  // La caché de claves se carga completa antes de cualquier resolución
  const keyCache = config.KEY_CACHE_FILE
    ? await KeyCache.fromFile(config.KEY_CACHE_FILE)
    : KeyCache.empty();
  if (config.KEY_CACHE_FILE) {
    logger.info({ file: config.KEY_CACHE_FILE, entries: keyCache.size }, 'Key cache loaded');
  }

  const metrics = new DownloadMetrics();
  const downloader = new HlsDownloader({
    http: new AxiosHttpClient({
      timeoutMs: config.HTTP_TIMEOUT_MS,
      userAgent: config.USER_AGENT,
      referer: config.REFERER,
      logger,
    }),
    decryptor: new Aes128CbcDecryptor(),
    keyCache,
    scratchDirectory: config.SCRATCH_DIR,
    logger,
    metrics,
  });

  try {
    const result = await downloader.download({
      url,
      output,
      policy: config.bandwidthPolicy,
      cliKey: config.DECRYPTION_KEY,
      onProgress: ({ current, total }) => {
        logger.info(`Segment ${current}/${total}`);
      },
    });

    logger.info({
      source: sanitizeUrlForLogging(result.sourceUrl),
      mediaPlaylist: sanitizeUrlForLogging(result.mediaPlaylistUrl),
      bandwidth: result.variant?.bandwidth,
      segments: result.segments,
      bytesWritten: result.bytesWritten,
      encrypted: result.encrypted,
      keySource: result.keySource,
      output,
    }, 'Download completed');
  } finally {
    logger.debug({ metrics: await metrics.getSnapshot() }, 'Run metrics');
  }
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(describeError(error));
    process.exit(1);
  }

  const logger = createLogger({
    name: 'hls-fetch',
    level: config.LOG_LEVEL,
    pretty: isDevelopment(config),
  });

  try {
    await run(config, logger, process.argv.slice(2));
  } catch (error) {
    logger.error({
      code: isHlsError(error) ? error.code : 'UNEXPECTED_ERROR',
      resource: isHlsError(error) ? sanitizeUrlForLogging(error.resource) : undefined,
      error,
    }, describeError(error));
    logger.flush();
    process.exitCode = 1;
  }
}

main().catch(error => {
  console.error('Failed to start hls-fetch:', error);
  process.exit(1);
});
