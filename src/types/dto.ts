import { z } from 'zod';

// --- Schemas de Zod (Fuente de la Verdad) ---

export const BandwidthPolicyZod = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('min') }),
  z.object({ kind: z.literal('max') }),
  z.object({ kind: z.literal('exact'), bandwidth: z.number().int().nonnegative() }),
]);

export const DownloadRequestZod = z.object({
  url: z.string().url({ message: 'El campo url debe ser una URL válida' }),
  output: z.string().min(1, { message: 'El campo output es requerido' }),
  policy: BandwidthPolicyZod,
  cliKey: z.string().regex(/^[0-9a-fA-F]+$/).optional(),
});

// --- Tipos inferidos de Zod ---
export type BandwidthPolicy = z.infer<typeof BandwidthPolicyZod>;

// --- Playlist ---

export type AttributeSet = Record<string, string>;

export interface Variant {
  /** Ausente cuando BANDWIDTH no es un entero sin signo. */
  bandwidth?: number;
  url: string;
  attributes: AttributeSet;
}

export interface MediaSegment {
  sequenceNumber: number;
  uri: string;
}

export type EncryptionMethod = 'AES-128';

export interface EncryptionContext {
  method: EncryptionMethod;
  keyUri: string;
  /** IV normalizado a 32 dígitos hexadecimales. */
  iv?: string;
}

export interface MasterPlaylist {
  kind: 'master';
  variants: Variant[];
}

export interface MediaPlaylist {
  kind: 'media';
  mediaSequence: number;
  /** Ordenados por número de secuencia ascendente. */
  segments: MediaSegment[];
  encryption?: EncryptionContext;
}

export type Playlist = MasterPlaylist | MediaPlaylist;

// --- Keys ---

export type KeySource = 'override' | 'cache' | 'cache-absolute' | 'network';

export interface KeyResolution {
  /** Clave en hexadecimal. */
  key: string;
  source: KeySource;
}

// --- Download ---

export interface SegmentProgress {
  current: number;
  total: number;
  sequenceNumber: number;
}

export interface DownloadRequest extends z.infer<typeof DownloadRequestZod> {
  onProgress?: (progress: SegmentProgress) => void;
}

export interface DownloadResult {
  sourceUrl: string;
  mediaPlaylistUrl: string;
  variant?: Variant;
  segments: number;
  bytesWritten: number;
  encrypted: boolean;
  keySource?: KeySource;
  durationMs: number;
}
