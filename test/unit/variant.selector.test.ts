import { VariantSelector, describePolicy, parseBandwidthPolicy } from '../../src/core/selector/variant.selector';
import { ConfigurationError, ResolutionError } from '../../src/core/errors';
import { createSilentLogger } from '../../src/core/observability/logger';
import { Variant } from '../../src/types/dto';

function variant(url: string, bandwidth?: number): Variant {
  return {
    ...(bandwidth !== undefined ? { bandwidth } : {}),
    url,
    attributes: { BANDWIDTH: bandwidth !== undefined ? String(bandwidth) : 'unknown' },
  };
}

describe('VariantSelector', () => {
  const selector = new VariantSelector();
  const variants = [variant('mid.m3u8', 500), variant('low.m3u8', 100), variant('high.m3u8', 900)];

  it('should pick the smallest bandwidth for min', () => {
    expect(selector.select(variants, { kind: 'min' }).url).toBe('low.m3u8');
  });

  it('should pick the largest bandwidth for max', () => {
    expect(selector.select(variants, { kind: 'max' }).url).toBe('high.m3u8');
  });

  it('should pick the exact bandwidth', () => {
    expect(selector.select(variants, { kind: 'exact', bandwidth: 500 }).url).toBe('mid.m3u8');
  });

  it('should fail when no variant has the exact bandwidth', () => {
    expect(() => selector.select(variants, { kind: 'exact', bandwidth: 999 })).toThrow(ResolutionError);
  });

  it('should break ties by source order', () => {
    const tied = [variant('first.m3u8', 300), variant('second.m3u8', 300), variant('third.m3u8', 100)];

    expect(selector.select(tied, { kind: 'max' }).url).toBe('first.m3u8');
    expect(selector.select([...tied].reverse(), { kind: 'max' }).url).toBe('second.m3u8');
  });

  it('should skip non-numeric bandwidths and warn', () => {
    const logger = createSilentLogger();
    const warn = jest.spyOn(logger, 'warn');
    const mixed = [variant('unknown.m3u8'), variant('a.m3u8', 200), variant('b.m3u8', 400)];

    const selected = new VariantSelector(logger).select(mixed, { kind: 'min' });

    expect(selected.url).toBe('a.m3u8');
    expect(warn).toHaveBeenCalledWith(
      { excluded: ['unknown.m3u8'], policy: 'min' },
      'Variants with a non-numeric bandwidth are not selectable',
    );
  });

  it('should fail when no variant has a numeric bandwidth', () => {
    expect(() => selector.select([variant('unknown.m3u8')], { kind: 'max' })).toThrow(ResolutionError);
    expect(() => selector.select([], { kind: 'min' })).toThrow(ResolutionError);
  });

  it('should never match a non-numeric bandwidth exactly', () => {
    expect(() => selector.select([variant('unknown.m3u8')], { kind: 'exact', bandwidth: 0 })).toThrow(ResolutionError);
  });

  it('should name the master playlist in errors', () => {
    try {
      selector.select([], { kind: 'max' }, 'https://example.com/master.m3u8');
      throw new Error('expected select to fail');
    } catch (error) {
      expect(error).toMatchObject({ resource: 'https://example.com/master.m3u8' });
    }
  });
});

describe('parseBandwidthPolicy', () => {
  it('should parse min, max and integers', () => {
    expect(parseBandwidthPolicy('min')).toEqual({ kind: 'min' });
    expect(parseBandwidthPolicy(' MAX ')).toEqual({ kind: 'max' });
    expect(parseBandwidthPolicy('2560000')).toEqual({ kind: 'exact', bandwidth: 2560000 });
  });

  it('should reject anything else', () => {
    expect(() => parseBandwidthPolicy('fastest')).toThrow(ConfigurationError);
    expect(() => parseBandwidthPolicy('-5')).toThrow(ConfigurationError);
  });

  it('should describe policies', () => {
    expect(describePolicy({ kind: 'exact', bandwidth: 500 })).toBe('exact(500)');
    expect(describePolicy({ kind: 'min' })).toBe('min');
  });
});
