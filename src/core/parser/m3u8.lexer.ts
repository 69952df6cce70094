import { AttributeSet } from '../../types/dto.js';
import { FormatError } from '../errors.js';
import { parseAttributes } from './attributes.js';

export const M3U8_HEADER = '#EXTM3U';

const TAG_PREFIX = '#EXT';
const STREAM_INF_TAG = '#EXT-X-STREAM-INF';
const KEY_TAG = '#EXT-X-KEY';
const MEDIA_SEQUENCE_TAG = '#EXT-X-MEDIA-SEQUENCE';

export type M3U8Event =
  | { type: 'stream-info'; attributes: AttributeSet; line: number }
  | { type: 'key'; attributes: AttributeSet; line: number }
  | { type: 'media-sequence'; value: number; line: number }
  | { type: 'ignored-tag'; tag: string; line: number }
  | { type: 'uri'; uri: string; line: number };

/**
 * Separa una línea de tag en nombre y valor (`#EXT-X-KEY:METHOD=...`).
 */
function splitTag(line: string): { name: string; value: string } {
  const colon = line.indexOf(':');
  if (colon === -1) {
    return { name: line, value: '' };
  }
  return { name: line.slice(0, colon), value: line.slice(colon + 1) };
}

/**
 * Recorre el texto de una playlist y produce un evento por cada línea con
 * contenido. La cabecera `#EXTM3U` se valida antes del primer evento.
 * Los números de línea empiezan en 1.
 */
export function* tokenize(text: string, resource: string): Generator<M3U8Event, void, undefined> {
  const lines = text.split(/\r?\n/).map(line => line.trim());

  if (lines[0] !== M3U8_HEADER) {
    throw new FormatError(`Playlist must start with ${M3U8_HEADER}`, resource);
  }

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];
    if (!line) continue;
    const lineNumber = i + 1;

    if (!line.startsWith(TAG_PREFIX)) {
      yield { type: 'uri', uri: line, line: lineNumber };
      continue;
    }

    const { name, value } = splitTag(line);
    switch (name) {
      case STREAM_INF_TAG:
        yield { type: 'stream-info', attributes: parseAttributes(value, resource), line: lineNumber };
        break;
      case KEY_TAG:
        yield { type: 'key', attributes: parseAttributes(value, resource), line: lineNumber };
        break;
      case MEDIA_SEQUENCE_TAG: {
        const sequence = value.trim();
        const parsed = Number(sequence);
        if (!/^\d+$/.test(sequence) || !Number.isSafeInteger(parsed)) {
          throw new FormatError(`Invalid ${MEDIA_SEQUENCE_TAG} value "${value}" at line ${lineNumber}`, resource);
        }
        yield { type: 'media-sequence', value: parsed, line: lineNumber };
        break;
      }
      default:
        yield { type: 'ignored-tag', tag: name, line: lineNumber };
    }
  }
}
