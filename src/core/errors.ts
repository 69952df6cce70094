export type HlsErrorCode =
  | 'FORMAT_ERROR'
  | 'RESOLUTION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CRYPTO_ERROR'
  | 'STORAGE_ERROR'
  | 'CONFIGURATION_ERROR';

/**
 * Clase base de todos los fallos de una descarga. `resource` identifica la URL,
 * el archivo o la variable de configuración implicada.
 */
export abstract class HlsError extends Error {
  abstract readonly code: HlsErrorCode;

  constructor(
    message: string,
    public readonly resource: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Playlist, lista de atributos o archivo de claves mal formado. */
export class FormatError extends HlsError {
  readonly code = 'FORMAT_ERROR';
}

/** Ninguna variante o clave satisface la petición. */
export class ResolutionError extends HlsError {
  readonly code = 'RESOLUTION_ERROR';
}

export class TransportError extends HlsError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(
    message: string,
    resource: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, resource, options);
  }
}

export class CryptoError extends HlsError {
  readonly code = 'CRYPTO_ERROR';
}

/** Fallo del archivo de salida o del almacenamiento temporal. */
export class StorageError extends HlsError {
  readonly code = 'STORAGE_ERROR';
}

export class ConfigurationError extends HlsError {
  readonly code = 'CONFIGURATION_ERROR';
}

export function isHlsError(error: unknown): error is HlsError {
  return error instanceof HlsError;
}

/**
 * Diagnóstico de una sola línea para el error que termina la ejecución.
 */
export function describeError(error: unknown): string {
  if (isHlsError(error)) {
    const cause = error.cause instanceof Error ? ` (cause: ${error.cause.message})` : '';
    return `${error.code}: ${error.message} [${error.resource}]${cause}`;
  }
  if (error instanceof Error) {
    return `UNEXPECTED_ERROR: ${error.message}`;
  }
  return `UNEXPECTED_ERROR: ${String(error)}`;
}
