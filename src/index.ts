export * from './types/dto.js';
export * from './core/errors.js';
export { parseConfig, loadConfig } from './config/env.js';
export type { AppConfig, EnvConfig } from './config/env.js';
export { createLogger, createSilentLogger } from './core/observability/logger.js';
export type { Logger, LoggerOptions } from './core/observability/logger.js';
export { DownloadMetrics } from './core/observability/metrics.js';
export type { MetricsSnapshot } from './core/observability/metrics.js';
export type { IHttpClient } from './core/contracts/http.client.js';
export type { IDecryptor, DecryptRequest } from './core/contracts/decryptor.js';
export type { IOutputSink } from './core/contracts/output.sink.js';
export { parseAttributes, formatAttributes } from './core/parser/attributes.js';
export { normalizeIv, sequenceNumberIv, segmentIv } from './core/parser/iv.js';
export { tokenize } from './core/parser/m3u8.lexer.js';
export type { M3U8Event } from './core/parser/m3u8.lexer.js';
export { M3U8Parser } from './core/parser/m3u8.parser.js';
export { VariantSelector, parseBandwidthPolicy, describePolicy } from './core/selector/variant.selector.js';
export { KeyCache } from './core/keys/key-cache.js';
export { KeyResolver } from './core/keys/key.resolver.js';
export type { KeyLookup } from './core/keys/key.resolver.js';
export { AxiosHttpClient } from './core/http/axios-http.client.js';
export type { HttpClientOptions } from './core/http/axios-http.client.js';
export { Aes128CbcDecryptor } from './core/crypto/aes128.decryptor.js';
export { ScratchStorage, SegmentScratch } from './core/pipeline/scratch.storage.js';
export { FileOutputSink } from './core/pipeline/file-output.sink.js';
export { SegmentPipeline } from './core/pipeline/segment.pipeline.js';
export type { PipelineRun, SegmentPipelineDependencies } from './core/pipeline/segment.pipeline.js';
export { HlsDownloader } from './core/downloader/hls-downloader.service.js';
export type { DownloaderContext } from './core/downloader/hls-downloader.service.js';
