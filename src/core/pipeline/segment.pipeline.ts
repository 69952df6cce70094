import {
  EncryptionContext,
  MediaSegment,
  SegmentProgress,
} from '../../types/dto.js';
import { IHttpClient } from '../contracts/http.client.js';
import { IDecryptor } from '../contracts/decryptor.js';
import { IOutputSink } from '../contracts/output.sink.js';
import { ResolutionError } from '../errors.js';
import { Logger, createSilentLogger } from '../observability/logger.js';
import { DownloadMetrics } from '../observability/metrics.js';
import { segmentIv } from '../parser/iv.js';
import { absolutizeUri, sanitizeUrlForLogging } from '../../utils/url.js';
import { ScratchStorage, SegmentScratch } from './scratch.storage.js';

export interface SegmentPipelineDependencies {
  http: IHttpClient;
  decryptor: IDecryptor;
  scratch: ScratchStorage;
  logger?: Logger;
  metrics?: DownloadMetrics;
}

export interface PipelineRun {
  segments: readonly MediaSegment[];
  /** URL de la playlist de media, base para las URIs relativas de los segmentos. */
  baseUrl: string;
  encryption?: EncryptionContext;
  /** Clave resuelta (hex); obligatoria si hay cifrado. */
  key?: string;
  sink: IOutputSink;
  onProgress?: (progress: SegmentProgress) => void;
}

interface SegmentTask {
  segment: MediaSegment;
  url: string;
  encryption?: EncryptionContext;
  key?: string;
  sink: IOutputSink;
}

/**
 * Descarga, descifra y concatena los segmentos de uno en uno, en orden de
 * secuencia ascendente. El primer fallo aborta la ejecución completa: los
 * segmentos posteriores no se solicitan.
 */
export class SegmentPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: SegmentPipelineDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  /**
   * @returns Bytes añadidos a la salida.
   */
  async run(run: PipelineRun): Promise<number> {
    if (run.encryption && !run.key) {
      throw new ResolutionError('Encryption is declared but no decryption key was resolved', run.encryption.keyUri);
    }

    const ordered = [...run.segments].sort((a, b) => a.sequenceNumber - b.sequenceNumber);
    const total = ordered.length;
    let bytesWritten = 0;

    for (const [index, segment] of ordered.entries()) {
      const progress: SegmentProgress = { current: index + 1, total, sequenceNumber: segment.sequenceNumber };
      this.logger.debug({ progress }, 'Processing segment');
      run.onProgress?.(progress);

      bytesWritten += await this.processSegment({
        segment,
        url: absolutizeUri(segment.uri, run.baseUrl),
        encryption: run.encryption,
        key: run.key,
        sink: run.sink,
      });
    }

    this.logger.info({ segments: total, bytesWritten, output: run.sink.location }, 'All segments appended');
    return bytesWritten;
  }

  private async processSegment(task: SegmentTask): Promise<number> {
    const { segment, url, encryption, key, sink } = task;
    const startTime = Date.now();
    const encrypted = encryption !== undefined;
    const scratch = this.deps.scratch.allocate(`segment-${segment.sequenceNumber}`);

    let appended: number;
    try {
      const raw = scratch.file('raw');
      await this.deps.http.download(url, raw);

      let payload = raw;
      if (encryption && key) {
        const plain = scratch.file('plain');
        await this.deps.decryptor.decrypt({
          source: raw,
          destination: plain,
          key,
          iv: segmentIv(encryption, segment.sequenceNumber),
          resource: url,
        });
        payload = plain;
      }

      appended = await sink.append(payload);
    } catch (error) {
      this.deps.metrics?.recordSegment('failed', 0, Date.now() - startTime, encrypted);
      await this.releaseAfterFailure(scratch, segment);
      throw error;
    }

    await scratch.release();
    this.deps.metrics?.recordSegment('completed', appended, Date.now() - startTime, encrypted);
    this.logger.debug({
      sequenceNumber: segment.sequenceNumber,
      url: sanitizeUrlForLogging(url),
      bytes: appended,
    }, 'Segment appended');

    return appended;
  }

  /**
   * Libera el almacenamiento temporal de un segmento fallido sin ocultar el
   * error original, que el llamador vuelve a lanzar.
   */
  private async releaseAfterFailure(scratch: SegmentScratch, segment: MediaSegment): Promise<void> {
    try {
      await scratch.release();
    } catch (releaseError) {
      this.logger.error({
        sequenceNumber: segment.sequenceNumber,
        error: releaseError,
      }, 'Failed to release scratch storage of a failed segment');
    }
  }
}
