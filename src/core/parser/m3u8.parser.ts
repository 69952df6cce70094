import {
  AttributeSet,
  EncryptionContext,
  MediaSegment,
  Playlist,
  Variant,
} from '../../types/dto.js';
import { FormatError } from '../errors.js';
import { Logger, createSilentLogger } from '../observability/logger.js';
import { M3U8Event, tokenize } from './m3u8.lexer.js';
import { normalizeIv } from './iv.js';

const SUPPORTED_METHOD = 'AES-128';

type PlaylistKind = 'unknown' | 'master' | 'media';

interface PendingVariant {
  attributes: AttributeSet;
  bandwidth?: number;
  line: number;
}

/**
 * Estado explícito del parser mientras consume los eventos del lexer.
 */
interface ParserState {
  kind: PlaylistKind;
  pendingVariant?: PendingVariant;
  encryption?: EncryptionContext;
  sequenceCounter: number;
  mediaSequence: number;
  variants: Variant[];
  segments: Map<number, string>;
}

function parseBandwidth(value: string): number | undefined {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

export class M3U8Parser {
  constructor(private readonly logger: Logger = createSilentLogger()) {}

  /**
   * Parsea una playlist maestra o de media.
   *
   * La playlist es maestra en cuanto aparece un EXT-X-STREAM-INF; la primera
   * línea de URI sin variante pendiente la convierte en playlist de media.
   *
   * @param text - Contenido M3U8.
   * @param resource - URL o nombre de la playlist, para los mensajes de error.
   */
  parse(text: string, resource = 'playlist'): Playlist {
    const state: ParserState = {
      kind: 'unknown',
      sequenceCounter: 0,
      mediaSequence: 0,
      variants: [],
      segments: new Map(),
    };

    for (const event of tokenize(text, resource)) {
      this.apply(state, event, resource);
    }

    if (state.pendingVariant) {
      throw new FormatError(
        `EXT-X-STREAM-INF at line ${state.pendingVariant.line} is not followed by a URI`,
        resource,
      );
    }

    if (state.kind === 'master') {
      this.logger.debug({
        playlist: { resource, kind: 'master', variantsCount: state.variants.length },
      }, 'Parsed master playlist');
      return { kind: 'master', variants: state.variants };
    }

    const segments: MediaSegment[] = [...state.segments.entries()]
      .sort(([a], [b]) => a - b)
      .map(([sequenceNumber, uri]) => ({ sequenceNumber, uri }));

    this.logger.debug({
      playlist: {
        resource,
        kind: 'media',
        mediaSequence: state.mediaSequence,
        segmentsCount: segments.length,
        hasEncryption: !!state.encryption,
      },
    }, 'Parsed media playlist');

    return {
      kind: 'media',
      mediaSequence: state.mediaSequence,
      segments,
      ...(state.encryption ? { encryption: state.encryption } : {}),
    };
  }

  private apply(state: ParserState, event: M3U8Event, resource: string): void {
    switch (event.type) {
      case 'stream-info':
        this.openVariant(state, event.attributes, event.line, resource);
        break;
      case 'key':
        // Una nueva declaración reemplaza por completo a la anterior
        state.encryption = this.parseEncryption(event.attributes, event.line, resource);
        break;
      case 'media-sequence':
        state.sequenceCounter = event.value;
        state.mediaSequence = event.value;
        break;
      case 'ignored-tag':
        break;
      case 'uri':
        this.acceptUri(state, event.uri, event.line, resource);
        break;
    }
  }

  private openVariant(state: ParserState, attributes: AttributeSet, line: number, resource: string): void {
    if (state.kind === 'media') {
      throw new FormatError(`EXT-X-STREAM-INF at line ${line} inside a media playlist`, resource);
    }
    if (state.pendingVariant) {
      throw new FormatError(
        `EXT-X-STREAM-INF at line ${state.pendingVariant.line} is not followed by a URI`,
        resource,
      );
    }

    const bandwidth = attributes['BANDWIDTH'];
    if (bandwidth === undefined) {
      throw new FormatError(`EXT-X-STREAM-INF at line ${line} has no BANDWIDTH`, resource);
    }

    state.kind = 'master';
    state.pendingVariant = { attributes, bandwidth: parseBandwidth(bandwidth), line };
  }

  private acceptUri(state: ParserState, uri: string, line: number, resource: string): void {
    if (state.kind === 'master' || state.pendingVariant) {
      const pending = state.pendingVariant;
      if (!pending) {
        throw new FormatError(`URI "${uri}" at line ${line} has no preceding EXT-X-STREAM-INF`, resource);
      }
      state.variants.push({
        ...(pending.bandwidth !== undefined ? { bandwidth: pending.bandwidth } : {}),
        url: uri,
        attributes: pending.attributes,
      });
      state.pendingVariant = undefined;
      return;
    }

    state.kind = 'media';
    state.segments.set(state.sequenceCounter, uri);
    state.sequenceCounter += 1;
  }

  private parseEncryption(attributes: AttributeSet, line: number, resource: string): EncryptionContext {
    const method = attributes['METHOD'];
    if (method !== SUPPORTED_METHOD) {
      throw new FormatError(
        `Unsupported encryption method "${method ?? ''}" at line ${line}; only ${SUPPORTED_METHOD} is supported`,
        resource,
      );
    }

    const keyUri = attributes['URI'];
    if (!keyUri) {
      throw new FormatError(`EXT-X-KEY at line ${line} has no URI`, resource);
    }

    const iv = attributes['IV'];
    return {
      method: SUPPORTED_METHOD,
      keyUri,
      ...(iv !== undefined ? { iv: normalizeIv(iv, resource) } : {}),
    };
  }
}
