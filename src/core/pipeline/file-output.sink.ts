import fs, { FileHandle } from 'fs/promises';
import { IOutputSink } from '../contracts/output.sink.js';
import { StorageError } from '../errors.js';

/**
 * Archivo de salida que solo admite añadir contenido al final.
 */
export class FileOutputSink implements IOutputSink {
  private closed = false;

  private constructor(
    private readonly handle: FileHandle,
    public readonly location: string,
  ) {}

  /**
   * Crea (o trunca) el archivo de salida.
   */
  static async open(location: string): Promise<FileOutputSink> {
    try {
      const handle = await fs.open(location, 'w');
      return new FileOutputSink(handle, location);
    } catch (error) {
      throw new StorageError(`Cannot open output file ${location}`, location, { cause: error });
    }
  }

  async append(source: string): Promise<number> {
    if (this.closed) {
      throw new StorageError('Output file is already closed', this.location);
    }

    let data: Buffer;
    try {
      data = await fs.readFile(source);
    } catch (error) {
      throw new StorageError(`Cannot read segment payload ${source}`, source, { cause: error });
    }

    try {
      await this.handle.writeFile(data);
    } catch (error) {
      throw new StorageError(`Cannot append to output file ${this.location}`, this.location, { cause: error });
    }

    return data.length;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } catch (error) {
      throw new StorageError(`Cannot close output file ${this.location}`, this.location, { cause: error });
    }
  }
}
