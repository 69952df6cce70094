import { validateHeaderValue } from 'node:http';
import { extractOrigin } from './url.js';

// Expresión regular para nombres de cabecera válidos (según RFC 7230)
const SAFE_HEADER_NAME_REGEX = /^[!#$%&'*+\-.\^_`|~0-9a-zA-Z]+$/;

// Caracteres de control que deben ser eliminados de los valores de las cabeceras
const CONTROL_CHARS_REGEX = /[\u0000-\u001F\u007F]/g;

// Lista blanca explícita de cabeceras permitidas para las peticiones de playlists, claves y segmentos
const HEADER_ALLOWLIST: readonly string[] = [
  'user-agent',
  'accept',
  'accept-language',
  'referer',
  'origin',
];

/**
 * Valida un par nombre/valor de cabecera.
 * - El nombre debe cumplir con el formato de token de RFC 7230.
 * - El valor no debe contener caracteres inválidos.
 */
function isValidHeader(name: string, value: string): boolean {
  if (!SAFE_HEADER_NAME_REGEX.test(name)) {
    return false;
  }
  try {
    // `validateHeaderValue` de Node.js arroja un error si el valor es inválido
    validateHeaderValue(name, value);
    return true;
  } catch {
    return false;
  }
}

export interface RequestHeaderProfile {
  userAgent: string;
  referer?: string;
}

export class HeadersManager {
  private headers: Record<string, string>;

  constructor(initialHeaders: Record<string, string> = {}) {
    this.headers = {};
    for (const [key, value] of Object.entries(initialHeaders)) {
      this.set(key, value);
    }
  }

  /**
   * Establece una cabecera, asegurándose de que el nombre sea canónico (minúsculas).
   */
  public set(key: string, value: string): this {
    this.headers[key.toLowerCase()] = value;
    return this;
  }

  /**
   * Obtiene el valor de una cabecera por su nombre (insensible a mayúsculas/minúsculas).
   */
  public get(key: string): string | undefined {
    return this.headers[key.toLowerCase()];
  }

  /**
   * Devuelve todas las cabeceras como un objeto plano.
   */
  public getAll(): Record<string, string> {
    return { ...this.headers };
  }

  /**
   * Construye las cabeceras comunes a todas las peticiones de una descarga.
   * Las cabeceras fuera de la lista blanca o con valores inválidos se descartan.
   *
   * @param profile - User-Agent y, opcionalmente, la página de origen (Referer).
   */
  public static buildRequestHeaders(profile: RequestHeaderProfile): HeadersManager {
    const manager = new HeadersManager();

    manager.set('User-Agent', profile.userAgent);
    manager.set('Accept', '*/*');
    manager.set('Accept-Language', 'en-US,en;q=0.8');

    if (profile.referer) {
      manager.set('Referer', profile.referer);
      const origin = extractOrigin(profile.referer);
      if (origin) {
        manager.set('Origin', origin);
      }
    }

    // Saneamiento y validación final
    const finalHeaders: Record<string, string> = {};
    for (const [key, value] of Object.entries(manager.getAll())) {
      if (!HEADER_ALLOWLIST.includes(key)) {
        continue;
      }

      const cleanedValue = value.replace(CONTROL_CHARS_REGEX, '');
      if (isValidHeader(key, cleanedValue)) {
        finalHeaders[key] = cleanedValue;
      }
    }

    return new HeadersManager(finalHeaders);
  }
}
