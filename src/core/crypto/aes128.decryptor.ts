import crypto from 'crypto';
import fs from 'fs/promises';
import { DecryptRequest, IDecryptor } from '../contracts/decryptor.js';
import { CryptoError, StorageError } from '../errors.js';

const ALGORITHM = 'aes-128-cbc';
const KEY_BYTES = 16;
const IV_BYTES = 16;
const HEX_REGEX = /^[0-9a-fA-F]+$/;

function decodeHex(value: string, expectedBytes: number, label: string, resource: string): Buffer {
  if (value.length !== expectedBytes * 2 || !HEX_REGEX.test(value)) {
    throw new CryptoError(`${label} must be ${expectedBytes * 2} hex digits`, resource);
  }
  return Buffer.from(value, 'hex');
}

/**
 * Descifrado AES-128-CBC con relleno PKCS#7 de un archivo completo.
 */
export class Aes128CbcDecryptor implements IDecryptor {
  async decrypt(request: DecryptRequest): Promise<number> {
    const { source, destination, resource } = request;
    const key = decodeHex(request.key, KEY_BYTES, 'Key', resource);
    const iv = decodeHex(request.iv, IV_BYTES, 'IV', resource);

    let encrypted: Buffer;
    try {
      encrypted = await fs.readFile(source);
    } catch (error) {
      throw new StorageError(`Cannot read encrypted segment ${source}`, source, { cause: error });
    }

    let decrypted: Buffer;
    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, key, iv);
      decrypted = Buffer.concat([decipher.update(encrypted), decipher.final()]);
    } catch (error) {
      throw new CryptoError('AES-128-CBC decryption failed', resource, { cause: error });
    }

    try {
      await fs.writeFile(destination, decrypted);
    } catch (error) {
      throw new StorageError(`Cannot write decrypted segment ${destination}`, destination, { cause: error });
    }

    return decrypted.length;
  }
}
