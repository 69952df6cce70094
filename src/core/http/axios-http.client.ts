import fs from 'fs';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { IHttpClient } from '../contracts/http.client.js';
import { StorageError, TransportError } from '../errors.js';
import { Logger, createSilentLogger } from '../observability/logger.js';
import { HeadersManager } from '../../utils/headers.js';
import { sanitizeUrlForLogging } from '../../utils/url.js';

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  referer?: string;
  /** Adaptador alternativo de axios (p.ej. un stand-in en memoria para tests). */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

/**
 * Traduce un fallo de axios a un TransportError con el status HTTP, si lo hay.
 */
function toTransportError(error: unknown, url: string): TransportError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const reason = status !== undefined ? `HTTP ${status}` : (error.code ?? error.message);
    return new TransportError(`Request failed (${reason})`, url, status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request failed (${message})`, url, undefined, { cause: error });
}

export class AxiosHttpClient implements IHttpClient {
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.client = axios.create({
      headers: HeadersManager.buildRequestHeaders({
        userAgent: options.userAgent,
        referer: options.referer,
      }).getAll(),
      timeout: options.timeoutMs,
      maxRedirects: 5,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  async getText(url: string): Promise<string> {
    this.logger.debug({ url: sanitizeUrlForLogging(url) }, 'Fetching playlist');
    try {
      const response = await this.client.get<string>(url, { responseType: 'text' });
      return response.data;
    } catch (error) {
      throw toTransportError(error, url);
    }
  }

  async getBytes(url: string): Promise<Buffer> {
    this.logger.debug({ url: sanitizeUrlForLogging(url) }, 'Fetching binary resource');
    try {
      const response = await this.client.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
      return Buffer.from(response.data);
    } catch (error) {
      throw toTransportError(error, url);
    }
  }

  async download(url: string, destination: string): Promise<number> {
    let body: Readable;
    try {
      const response = await this.client.get<Readable>(url, { responseType: 'stream' });
      body = response.data;
    } catch (error) {
      // El cuerpo de una respuesta de error sigue abierto: liberar el socket
      if (axios.isAxiosError(error) && error.response?.data instanceof Readable) {
        error.response.data.destroy();
      }
      throw toTransportError(error, url);
    }

    const output = fs.createWriteStream(destination);

    // El primer 'error' identifica el extremo que falló; pipeline destruye luego el otro
    const failure: { side?: 'source' | 'destination' } = {};
    body.once('error', () => {
      failure.side ??= 'source';
    });
    output.once('error', () => {
      failure.side ??= 'destination';
    });

    try {
      await pipeline(body, output);
    } catch (error) {
      if (failure.side === 'destination') {
        throw new StorageError(`Cannot write segment data to ${destination}`, destination, { cause: error });
      }
      throw toTransportError(error, url);
    }

    return output.bytesWritten;
  }
}
