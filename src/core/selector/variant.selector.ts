import { BandwidthPolicy, Variant } from '../../types/dto.js';
import { ConfigurationError, ResolutionError } from '../errors.js';
import { Logger, createSilentLogger } from '../observability/logger.js';

type NumericVariant = Variant & { bandwidth: number };

function hasNumericBandwidth(variant: Variant): variant is NumericVariant {
  return variant.bandwidth !== undefined;
}

/**
 * Convierte `min`, `max` o un entero sin signo en una política de selección.
 */
export function parseBandwidthPolicy(value: string): BandwidthPolicy {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'min') {
    return { kind: 'min' };
  }
  if (normalized === 'max') {
    return { kind: 'max' };
  }
  if (/^\d+$/.test(normalized)) {
    return { kind: 'exact', bandwidth: Number(normalized) };
  }
  throw new ConfigurationError(`Invalid bandwidth policy "${value}" (expected min, max or an integer)`, 'BANDWIDTH');
}

export function describePolicy(policy: BandwidthPolicy): string {
  return policy.kind === 'exact' ? `exact(${policy.bandwidth})` : policy.kind;
}

export class VariantSelector {
  constructor(private readonly logger: Logger = createSilentLogger()) {}

  /**
   * Elige exactamente una variante según la política.
   *
   * Las variantes sin BANDWIDTH numérico nunca son seleccionables: quedan
   * fuera de los candidatos de min/max (con un warning) y no igualan ningún
   * `exact`.
   *
   * @param resource - Playlist maestra de origen, para los mensajes de error.
   */
  select(variants: readonly Variant[], policy: BandwidthPolicy, resource = 'master playlist'): Variant {
    const candidates = variants.filter(hasNumericBandwidth);

    if (policy.kind === 'exact') {
      const match = candidates.find(variant => variant.bandwidth === policy.bandwidth);
      if (!match) {
        throw new ResolutionError(`No variant with bandwidth ${policy.bandwidth}`, resource);
      }
      return match;
    }

    if (candidates.length < variants.length) {
      this.logger.warn({
        excluded: variants.filter(variant => !hasNumericBandwidth(variant)).map(variant => variant.url),
        policy: policy.kind,
      }, 'Variants with a non-numeric bandwidth are not selectable');
    }

    const [first, ...rest] = candidates;
    if (!first) {
      throw new ResolutionError(`No variant with a numeric bandwidth to apply policy ${policy.kind}`, resource);
    }

    // Ante un empate gana la primera variante en orden de aparición
    return rest.reduce<NumericVariant>((best, variant) => {
      const better = policy.kind === 'min'
        ? variant.bandwidth < best.bandwidth
        : variant.bandwidth > best.bandwidth;
      return better ? variant : best;
    }, first);
  }
}
