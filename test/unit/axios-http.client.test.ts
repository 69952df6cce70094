import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { AxiosAdapter, AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AxiosHttpClient } from '../../src/core/http/axios-http.client';
import { StorageError, TransportError } from '../../src/core/errors';

type Reply = { status: number; data?: unknown } | { networkError: string };

/**
 * Adaptador de axios en memoria: responde según la URL pedida.
 */
function createAdapter(routes: Record<string, () => Reply>, seen: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    const route = routes[config.url ?? ''];
    const reply: Reply = route ? route() : { status: 404, data: '' };

    if ('networkError' in reply) {
      throw new AxiosError('network failure', reply.networkError, config);
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, AxiosError.ERR_BAD_RESPONSE, config, undefined, response);
    }
    return response;
  };
}

describe('AxiosHttpClient', () => {
  let seen: InternalAxiosRequestConfig[];
  let client: AxiosHttpClient;

  beforeEach(() => {
    seen = [];
    client = new AxiosHttpClient({
      timeoutMs: 1000,
      userAgent: 'test-agent',
      referer: 'https://player.example.com/watch',
      adapter: createAdapter({
        'https://cdn.example.com/index.m3u8': () => ({ status: 200, data: '#EXTM3U\nseg.ts' }),
        'https://cdn.example.com/key.bin': () => ({ status: 200, data: Buffer.from([0xde, 0xad]) }),
        'https://cdn.example.com/seg.ts': () => ({ status: 200, data: Readable.from([Buffer.from('abc'), Buffer.from('def')]) }),
        'https://cdn.example.com/broken.ts': () => ({
          status: 200,
          data: new Readable({
            read() {
              this.destroy(new Error('socket hang up'));
            },
          }),
        }),
        'https://cdn.example.com/forbidden': () => ({ status: 403, data: '' }),
        'https://cdn.example.com/timeout': () => ({ networkError: 'ECONNABORTED' }),
      }, seen),
    });
  });

  it('should fetch text with the configured headers', async () => {
    await expect(client.getText('https://cdn.example.com/index.m3u8')).resolves.toBe('#EXTM3U\nseg.ts');

    const headers = seen[0]?.headers;
    expect(headers?.get('User-Agent')).toBe('test-agent');
    expect(headers?.get('Referer')).toBe('https://player.example.com/watch');
    expect(headers?.get('Origin')).toBe('https://player.example.com');
    expect(seen[0]?.timeout).toBe(1000);
  });

  it('should fetch raw bytes', async () => {
    const bytes = await client.getBytes('https://cdn.example.com/key.bin');
    expect(bytes.toString('hex')).toBe('dead');
  });

  it('should map HTTP failures to TransportError with the status', async () => {
    await expect(client.getBytes('https://cdn.example.com/forbidden')).rejects.toMatchObject({
      code: 'TRANSPORT_ERROR',
      status: 403,
      resource: 'https://cdn.example.com/forbidden',
      message: 'Request failed (HTTP 403)',
    });
  });

  it('should map network failures to TransportError without status', async () => {
    const error = await client.getText('https://cdn.example.com/timeout').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: 'Request failed (ECONNABORTED)', status: undefined });
  });

  describe('download', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'http-client-test-'));
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('should stream the body into the destination', async () => {
      const destination = path.join(directory, 'seg.raw');

      const bytes = await client.download('https://cdn.example.com/seg.ts', destination);

      expect(bytes).toBe(6);
      expect(await fs.readFile(destination, 'utf-8')).toBe('abcdef');
    });

    it('should report a broken body as a transport failure', async () => {
      await expect(client.download('https://cdn.example.com/broken.ts', path.join(directory, 'broken.raw')))
        .rejects.toBeInstanceOf(TransportError);
    });

    it('should report an unwritable destination as a storage failure', async () => {
      await expect(client.download('https://cdn.example.com/seg.ts', path.join(directory, 'missing', 'seg.raw')))
        .rejects.toBeInstanceOf(StorageError);
    });

    it('should release the body of an error response', async () => {
      const errorBody = Readable.from([Buffer.from('<html>gone</html>')]);
      const gone = new AxiosHttpClient({
        timeoutMs: 1000,
        userAgent: 'test-agent',
        adapter: createAdapter({ 'https://cdn.example.com/gone.ts': () => ({ status: 410, data: errorBody }) }, seen),
      });

      await expect(gone.download('https://cdn.example.com/gone.ts', path.join(directory, 'gone.raw')))
        .rejects.toMatchObject({ code: 'TRANSPORT_ERROR', status: 410 });
      expect(errorBody.destroyed).toBe(true);
    });

    it('should report HTTP failures before writing anything', async () => {
      const destination = path.join(directory, 'forbidden.raw');

      await expect(client.download('https://cdn.example.com/forbidden', destination))
        .rejects.toMatchObject({ status: 403 });
      await expect(fs.access(destination)).rejects.toThrow();
    });
  });
});
