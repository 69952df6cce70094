import { EncryptionContext } from '../../types/dto.js';
import { FormatError } from '../errors.js';

const IV_HEX_LENGTH = 32;
const HEX_REGEX = /^[0-9a-fA-F]+$/;

/**
 * Normaliza el IV de un EXT-X-KEY (`0x1A`, `1A`, ...) a exactamente 32 dígitos
 * hexadecimales en minúsculas: rellena con ceros a la izquierda si es corto y
 * descarta los dígitos sobrantes de la derecha si es largo.
 */
export function normalizeIv(raw: string, resource: string): string {
  const digits = raw.trim().replace(/^0x/i, '');
  if (!HEX_REGEX.test(digits)) {
    throw new FormatError(`Invalid IV "${raw}"`, resource);
  }

  const normalized = digits.length > IV_HEX_LENGTH
    ? digits.slice(0, IV_HEX_LENGTH)
    : digits.padStart(IV_HEX_LENGTH, '0');

  return normalized.toLowerCase();
}

/**
 * IV implícito de un segmento: su número de secuencia en 32 dígitos hexadecimales.
 */
export function sequenceNumberIv(sequenceNumber: number): string {
  return sequenceNumber.toString(16).padStart(IV_HEX_LENGTH, '0');
}

export function segmentIv(encryption: EncryptionContext, sequenceNumber: number): string {
  return encryption.iv ?? sequenceNumberIv(sequenceNumber);
}
