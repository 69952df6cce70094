import fs from 'fs/promises';
import { FormatError, StorageError } from '../errors.js';

/**
 * Mapa de solo lectura URI de clave → clave en hexadecimal.
 *
 * Formato del archivo: una entrada `<URI><espacio><clave-hex>` por línea.
 * Las líneas en blanco se ignoran y, si una URI se repite, gana la última.
 */
export class KeyCache {
  private readonly entries: ReadonlyMap<string, string>;

  private constructor(entries: Map<string, string>) {
    this.entries = entries;
  }

  static empty(): KeyCache {
    return new KeyCache(new Map());
  }

  static parse(text: string, source = 'key cache'): KeyCache {
    const entries = new Map<string, string>();
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]?.trim();
      if (!line) continue;

      const [uri, key, ...extra] = line.split(/\s+/);
      if (!uri || !key || extra.length > 0) {
        throw new FormatError(`Invalid key cache entry at line ${i + 1} (expected "<uri> <hex-key>")`, source);
      }
      if (!/^[0-9a-fA-F]+$/.test(key)) {
        throw new FormatError(`Key at line ${i + 1} is not a hex string`, source);
      }

      entries.set(uri, key);
    }

    return new KeyCache(entries);
  }

  static async fromFile(filePath: string): Promise<KeyCache> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new StorageError(`Cannot read key cache file ${filePath}`, filePath, { cause: error });
    }
    return KeyCache.parse(text, filePath);
  }

  get(uri: string): string | undefined {
    return this.entries.get(uri);
  }

  get size(): number {
    return this.entries.size;
  }
}
