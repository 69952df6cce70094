import {
  ConfigurationError,
  CryptoError,
  FormatError,
  HlsError,
  StorageError,
  TransportError,
  describeError,
  isHlsError,
} from '../../src/core/errors';

describe('errors', () => {
  it('should carry code, name and resource', () => {
    const error = new FormatError('Missing #EXTM3U header', 'https://cdn.example.com/index.m3u8');

    expect(error).toBeInstanceOf(HlsError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('FORMAT_ERROR');
    expect(error.name).toBe('FormatError');
    expect(error.resource).toBe('https://cdn.example.com/index.m3u8');
  });

  it('should keep the HTTP status of transport failures', () => {
    const error = new TransportError('Request failed (HTTP 404)', 'https://cdn.example.com/seg.ts', 404);
    expect(error.status).toBe(404);
  });

  it('should recognise only download errors', () => {
    expect(isHlsError(new CryptoError('bad key', 'key.bin'))).toBe(true);
    expect(isHlsError(new Error('plain'))).toBe(false);
    expect(isHlsError('text')).toBe(false);
  });

  describe('describeError', () => {
    it('should format a download error with its resource', () => {
      expect(describeError(new ConfigurationError('No playlist URL given', 'SOURCE_URL')))
        .toBe('CONFIGURATION_ERROR: No playlist URL given [SOURCE_URL]');
    });

    it('should append the cause message', () => {
      const error = new StorageError('Cannot open output', 'out.ts', { cause: new Error('EACCES') });
      expect(describeError(error)).toBe('STORAGE_ERROR: Cannot open output [out.ts] (cause: EACCES)');
    });

    it('should describe unexpected values', () => {
      expect(describeError(new Error('boom'))).toBe('UNEXPECTED_ERROR: boom');
      expect(describeError(42)).toBe('UNEXPECTED_ERROR: 42');
    });
  });
});
