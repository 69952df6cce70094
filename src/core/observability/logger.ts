import pino from 'pino';

export type Logger = pino.Logger;

// Campos sensibles que deben ser enmascarados en logs
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'authorization',
  'cookie',
  'secret',
  'key',
];

// Los identificadores de clave (URIs, origen) no son secretos
const NON_SENSITIVE_FIELDS = ['keyuri', 'keysource'];

// Función para enmascarar valores sensibles
export function maskSensitiveData(obj: unknown): unknown {
  if (typeof obj !== 'object' || obj === null) {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(maskSensitiveData);
  }

  const masked: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = !NON_SENSITIVE_FIELDS.includes(lowerKey)
      && SENSITIVE_FIELDS.some(field => lowerKey.includes(field));

    if (isSensitive && typeof value === 'string') {
      masked[key] = value.length > 0 ? '***MASKED***' : '';
    } else if (typeof value === 'object' && value !== null) {
      masked[key] = maskSensitiveData(value);
    } else {
      masked[key] = value;
    }
  }

  return masked;
}

export interface LoggerOptions {
  level: pino.LevelWithSilent;
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  const loggerOptions: pino.LoggerOptions = {
    name: options.name,
    level: options.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  // En desarrollo, usar pretty print
  if (options.pretty) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(loggerOptions);
}

/**
 * Logger que descarta todo, para componentes sin logger inyectado.
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

// Helper para logs de performance
export function logPerformance(
  logger: Logger,
  operation: string,
  duration: number,
  success: boolean,
  metadata?: Record<string, unknown>,
): void {
  logger.info({
    performance: {
      operation,
      duration,
      success,
      metadata: metadata ? maskSensitiveData(metadata) : {},
      timestamp: new Date().toISOString(),
    },
  }, `Performance: ${operation} took ${duration}ms (${success ? 'success' : 'failed'})`);
}
