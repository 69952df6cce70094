const SCHEME_SEPARATOR = '://';

const SENSITIVE_PARAMS = [
  'token',
  'auth',
  'key',
  'password',
  'secret',
  'signature',
  'api_key',
  'apikey',
];

/**
 * Indica si la URI trae su propio esquema (`http://`, `skd://`, ...).
 */
export function hasScheme(uri: string): boolean {
  return uri.includes(SCHEME_SEPARATOR);
}

/**
 * Convierte una URI sin esquema en absoluta respecto de `baseUrl`; las que ya
 * tienen esquema se devuelven tal cual. Si la resolución falla (base inválida)
 * se devuelve la URI original.
 */
export function absolutizeUri(uri: string, baseUrl: string): string {
  if (hasScheme(uri)) {
    return uri;
  }

  try {
    return new URL(uri, baseUrl).href;
  } catch {
    return uri;
  }
}

/**
 * Valida si una URL usa http o https
 */
export function isHttpUrl(url: string): boolean {
  try {
    const parsedUrl = new URL(url);
    return ['http:', 'https:'].includes(parsedUrl.protocol);
  } catch {
    return false;
  }
}

/**
 * Sanitiza una URL para logging (oculta tokens sensibles)
 */
export function sanitizeUrlForLogging(url: string): string {
  try {
    const urlObj = new URL(url);

    for (const [key, value] of urlObj.searchParams.entries()) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_PARAMS.some(param => lowerKey.includes(param)) && value) {
        urlObj.searchParams.set(key, '***MASKED***');
      }
    }

    return urlObj.href;
  } catch {
    return url;
  }
}

/**
 * Obtiene el origen (protocol + hostname + port) de una URL, o undefined si no
 * es una URL absoluta válida.
 */
export function extractOrigin(url: string): string | undefined {
  try {
    const origin = new URL(url).origin;
    return origin === 'null' ? undefined : origin;
  } catch {
    return undefined;
  }
}
