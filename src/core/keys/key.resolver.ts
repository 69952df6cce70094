import { KeyResolution } from '../../types/dto.js';
import { IHttpClient } from '../contracts/http.client.js';
import { Logger, createSilentLogger } from '../observability/logger.js';
import { absolutizeUri, isHttpUrl, sanitizeUrlForLogging } from '../../utils/url.js';
import { KeyCache } from './key-cache.js';

export interface KeyLookup {
  /** URI tal como aparece en el EXT-X-KEY. */
  keyUri: string;
  /** URL de la playlist de media, base para URIs relativas. */
  baseUrl: string;
  /** Clave indicada por el usuario; tiene prioridad sobre todo lo demás. */
  cliKey?: string;
  cache: KeyCache;
}

export class KeyResolver {
  constructor(
    private readonly http: IHttpClient,
    private readonly logger: Logger = createSilentLogger(),
  ) {}

  /**
   * Resuelve la clave de descifrado en este orden:
   * 1. clave del usuario, sin modificar;
   * 2. caché por URI exacta;
   * 3. caché por URI absolutizada respecto de `baseUrl`;
   * 4. descarga http(s) de la URI absolutizada, codificada en hexadecimal.
   *
   * Devuelve undefined si ninguna fuente aplica; los fallos de descarga se
   * propagan como TransportError.
   */
  async resolve(lookup: KeyLookup): Promise<KeyResolution | undefined> {
    const { keyUri, baseUrl, cliKey, cache } = lookup;

    if (cliKey) {
      this.logger.debug({ keyUri, keySource: 'override' }, 'Using user supplied key');
      return { key: cliKey, source: 'override' };
    }

    const cached = cache.get(keyUri);
    if (cached !== undefined) {
      this.logger.debug({ keyUri, keySource: 'cache' }, 'Key cache hit');
      return { key: cached, source: 'cache' };
    }

    const absoluteUri = absolutizeUri(keyUri, baseUrl);
    const cachedAbsolute = cache.get(absoluteUri);
    if (cachedAbsolute !== undefined) {
      this.logger.debug({ keyUri: absoluteUri, keySource: 'cache-absolute' }, 'Key cache hit on absolute URI');
      return { key: cachedAbsolute, source: 'cache-absolute' };
    }

    if (isHttpUrl(absoluteUri)) {
      this.logger.info({ keyUri: sanitizeUrlForLogging(absoluteUri) }, 'Fetching decryption key');
      const bytes = await this.http.getBytes(absoluteUri);
      return { key: bytes.toString('hex'), source: 'network' };
    }

    this.logger.warn({ keyUri }, 'No source available for decryption key');
    return undefined;
  }
}
