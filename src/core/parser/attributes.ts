import { AttributeSet } from '../../types/dto.js';
import { FormatError } from '../errors.js';

/**
 * Parsea una lista de atributos `KEY=VALUE,KEY2="V,2"` de un tag M3U8.
 * Las comas dentro de comillas no separan atributos; si una clave se repite
 * gana la última aparición. Ningún valor puede contener comillas dobles.
 *
 * @param input - Texto que sigue a los dos puntos del tag.
 * @param resource - Playlist de origen, para los mensajes de error.
 */
export function parseAttributes(input: string, resource: string): AttributeSet {
  const attributes: AttributeSet = {};
  let rest = input;

  while (rest.length > 0) {
    const equals = rest.indexOf('=');
    const comma = rest.indexOf(',');
    if (equals === -1 || (comma !== -1 && comma < equals)) {
      throw new FormatError(`Attribute without "=" in "${input}"`, resource);
    }

    const key = rest.slice(0, equals).trim();
    if (key.length === 0) {
      throw new FormatError(`Attribute with an empty name in "${input}"`, resource);
    }
    rest = rest.slice(equals + 1);

    let value: string;
    if (rest.startsWith('"')) {
      const closing = rest.indexOf('"', 1);
      if (closing === -1) {
        throw new FormatError(`Unterminated quoted value for ${key} in "${input}"`, resource);
      }
      value = rest.slice(1, closing);
      rest = rest.slice(closing + 1);
      if (rest.length > 0 && !rest.startsWith(',')) {
        throw new FormatError(`Unexpected text after the value of ${key} in "${input}"`, resource);
      }
    } else {
      const next = rest.indexOf(',');
      value = next === -1 ? rest : rest.slice(0, next);
      rest = next === -1 ? '' : rest.slice(next);
      if (value.includes('"')) {
        throw new FormatError(`Unquoted value of ${key} contains a double quote in "${input}"`, resource);
      }
    }

    attributes[key] = value;

    if (rest.startsWith(',')) {
      rest = rest.slice(1);
    }
  }

  return attributes;
}

/**
 * Inverso de `parseAttributes`: entrecomilla los valores que contienen comas o
 * espacios.
 */
export function formatAttributes(attributes: AttributeSet): string {
  return Object.entries(attributes)
    .map(([key, value]) => {
      if (value.includes('"')) {
        throw new FormatError(`Attribute ${key} cannot contain a double quote`, 'attribute list');
      }
      return /[,\s]/.test(value) ? `${key}="${value}"` : `${key}=${value}`;
    })
    .join(',');
}
