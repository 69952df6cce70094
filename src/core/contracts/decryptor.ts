export interface DecryptRequest {
  /** Archivo con el texto cifrado. */
  source: string;
  /** Archivo nuevo donde se escribe el texto plano. */
  destination: string;
  /** Clave en hexadecimal. */
  key: string;
  /** IV en hexadecimal (32 dígitos). */
  iv: string;
  /** URL del segmento, para los mensajes de error. */
  resource: string;
}

export interface IDecryptor {
  /**
   * Descifra `source` en `destination` y devuelve los bytes escritos.
   * Los fallos se señalan con un CryptoError.
   */
  decrypt(request: DecryptRequest): Promise<number>;
}
