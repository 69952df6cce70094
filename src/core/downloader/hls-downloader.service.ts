import {
  DownloadRequest,
  DownloadRequestZod,
  DownloadResult,
  KeyResolution,
  MediaPlaylist,
  Variant,
} from '../../types/dto.js';
import { IHttpClient } from '../contracts/http.client.js';
import { IDecryptor } from '../contracts/decryptor.js';
import { IOutputSink } from '../contracts/output.sink.js';
import { ConfigurationError, FormatError, ResolutionError } from '../errors.js';
import { Logger, createSilentLogger, logPerformance } from '../observability/logger.js';
import { DownloadMetrics } from '../observability/metrics.js';
import { M3U8Parser } from '../parser/m3u8.parser.js';
import { VariantSelector, describePolicy } from '../selector/variant.selector.js';
import { KeyCache } from '../keys/key-cache.js';
import { KeyResolver } from '../keys/key.resolver.js';
import { SegmentPipeline } from '../pipeline/segment.pipeline.js';
import { ScratchStorage } from '../pipeline/scratch.storage.js';
import { FileOutputSink } from '../pipeline/file-output.sink.js';
import { absolutizeUri, sanitizeUrlForLogging } from '../../utils/url.js';

/**
 * Colaboradores de una descarga, construidos una vez por el llamador.
 */
export interface DownloaderContext {
  http: IHttpClient;
  decryptor: IDecryptor;
  keyCache: KeyCache;
  /** Directorio padre del almacenamiento temporal de la ejecución. */
  scratchDirectory: string;
  logger?: Logger;
  metrics?: DownloadMetrics;
  /** Fábrica del destino; por defecto un archivo. */
  openSink?: (location: string) => Promise<IOutputSink>;
}

interface ResolvedMediaPlaylist {
  url: string;
  playlist: MediaPlaylist;
  variant?: Variant;
}

export class HlsDownloader {
  private readonly logger: Logger;
  private readonly parser: M3U8Parser;
  private readonly selector: VariantSelector;
  private readonly keyResolver: KeyResolver;

  constructor(private readonly context: DownloaderContext) {
    this.logger = context.logger ?? createSilentLogger();
    this.parser = new M3U8Parser(this.logger);
    this.selector = new VariantSelector(this.logger);
    this.keyResolver = new KeyResolver(context.http, this.logger);
  }

  /**
   * Resuelve la playlist, descarga todos los segmentos y los concatena en
   * `request.output`. Cualquier error aborta la descarga; los bytes ya
   * escritos en la salida no se eliminan.
   */
  async download(request: DownloadRequest): Promise<DownloadResult> {
    const parsedRequest = DownloadRequestZod.safeParse(request);
    if (!parsedRequest.success) {
      const details = parsedRequest.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(`Invalid download request (${details.join('; ')})`, request.url);
    }

    const startTime = Date.now();
    const sanitizedUrl = sanitizeUrlForLogging(request.url);
    this.logger.info({ url: sanitizedUrl, policy: describePolicy(request.policy) }, 'Starting HLS download');

    try {
      const resolved = await this.resolveMediaPlaylist(request);
      const { playlist } = resolved;

      if (playlist.segments.length === 0) {
        throw new ResolutionError('Media playlist has no segments', resolved.url);
      }

      const keyResolution = await this.resolveKey(resolved, request.cliKey);
      const bytesWritten = await this.runPipeline(resolved, keyResolution, request);

      const result: DownloadResult = {
        sourceUrl: request.url,
        mediaPlaylistUrl: resolved.url,
        ...(resolved.variant ? { variant: resolved.variant } : {}),
        segments: playlist.segments.length,
        bytesWritten,
        encrypted: playlist.encryption !== undefined,
        ...(keyResolution ? { keySource: keyResolution.source } : {}),
        durationMs: Date.now() - startTime,
      };

      this.context.metrics?.recordRun('success');
      logPerformance(this.logger, 'hls-download', result.durationMs, true, {
        url: sanitizedUrl,
        segments: result.segments,
        bytesWritten,
      });
      return result;
    } catch (error) {
      this.context.metrics?.recordRun('error');
      logPerformance(this.logger, 'hls-download', Date.now() - startTime, false, { url: sanitizedUrl });
      throw error;
    }
  }

  /**
   * Descarga y parsea la playlist inicial; si es maestra, elige una variante y
   * descarga su playlist de media.
   */
  async resolveMediaPlaylist(request: Pick<DownloadRequest, 'url' | 'policy'>): Promise<ResolvedMediaPlaylist> {
    const initial = this.parser.parse(await this.context.http.getText(request.url), request.url);
    if (initial.kind === 'media') {
      return { url: request.url, playlist: initial };
    }

    const variant = this.selector.select(initial.variants, request.policy, request.url);
    const mediaUrl = absolutizeUri(variant.url, request.url);
    this.logger.info({
      bandwidth: variant.bandwidth,
      attributes: variant.attributes,
      url: sanitizeUrlForLogging(mediaUrl),
    }, 'Selected variant');

    const media = this.parser.parse(await this.context.http.getText(mediaUrl), mediaUrl);
    if (media.kind !== 'media') {
      throw new FormatError('Variant URL points to another master playlist', mediaUrl);
    }

    return { url: mediaUrl, playlist: media, variant };
  }

  private async resolveKey(resolved: ResolvedMediaPlaylist, cliKey?: string): Promise<KeyResolution | undefined> {
    const { encryption } = resolved.playlist;
    if (!encryption) {
      return undefined;
    }

    const resolution = await this.keyResolver.resolve({
      keyUri: encryption.keyUri,
      baseUrl: resolved.url,
      cliKey,
      cache: this.context.keyCache,
    });

    if (!resolution) {
      throw new ResolutionError('Segments are encrypted but the decryption key could not be resolved', encryption.keyUri);
    }

    this.context.metrics?.recordKeyResolution(resolution.source);
    return resolution;
  }

  private async runPipeline(
    resolved: ResolvedMediaPlaylist,
    keyResolution: KeyResolution | undefined,
    request: DownloadRequest,
  ): Promise<number> {
    const scratch = await ScratchStorage.create(this.context.scratchDirectory);
    const disposeScratch = (): Promise<void> => scratch.dispose();

    let sink: IOutputSink;
    try {
      const openSink = this.context.openSink ?? FileOutputSink.open;
      sink = await openSink(request.output);
    } catch (error) {
      await this.cleanupAfterFailure('dispose scratch storage', disposeScratch);
      throw error;
    }

    let bytesWritten: number;
    try {
      const pipeline = new SegmentPipeline({
        http: this.context.http,
        decryptor: this.context.decryptor,
        scratch,
        logger: this.logger,
        metrics: this.context.metrics,
      });

      bytesWritten = await pipeline.run({
        segments: resolved.playlist.segments,
        baseUrl: resolved.url,
        encryption: resolved.playlist.encryption,
        key: keyResolution?.key,
        sink,
        onProgress: request.onProgress,
      });
    } catch (error) {
      await this.cleanupAfterFailure('close output', () => sink.close());
      await this.cleanupAfterFailure('dispose scratch storage', disposeScratch);
      throw error;
    }

    try {
      await sink.close();
    } catch (error) {
      await this.cleanupAfterFailure('dispose scratch storage', disposeScratch);
      throw error;
    }
    await scratch.dispose();

    return bytesWritten;
  }

  /**
   * Limpieza tras un fallo: un error aquí se registra y el llamador relanza el
   * error original.
   */
  private async cleanupAfterFailure(step: string, cleanup: () => Promise<void>): Promise<void> {
    try {
      await cleanup();
    } catch (cleanupError) {
      this.logger.error({ step, error: cleanupError }, 'Cleanup failed after an aborted download');
    }
  }
}
