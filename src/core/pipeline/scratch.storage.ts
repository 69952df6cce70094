import fs from 'fs/promises';
import path from 'path';
import { StorageError } from '../errors.js';

const DIRECTORY_PREFIX = 'hls-fetch-';

/**
 * Archivos temporales de un único segmento. Se liberan con `release()` antes
 * de pasar al siguiente segmento, tanto si el segmento terminó bien como si no.
 */
export class SegmentScratch {
  private readonly files: string[] = [];

  constructor(
    private readonly directory: string,
    private readonly prefix: string,
  ) {}

  /**
   * Reserva la ruta de un archivo temporal (`raw`, `plain`, ...).
   */
  file(name: string): string {
    const filePath = path.join(this.directory, `${this.prefix}.${name}`);
    this.files.push(filePath);
    return filePath;
  }

  get allocated(): readonly string[] {
    return [...this.files];
  }

  async release(): Promise<void> {
    while (this.files.length > 0) {
      const filePath = this.files[this.files.length - 1];
      if (filePath === undefined) break;
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        throw new StorageError(`Cannot remove scratch file ${filePath}`, filePath, { cause: error });
      }
      this.files.pop();
    }
  }
}

/**
 * Directorio temporal de una descarga.
 */
export class ScratchStorage {
  private constructor(public readonly directory: string) {}

  static async create(parentDirectory: string): Promise<ScratchStorage> {
    try {
      const directory = await fs.mkdtemp(path.join(parentDirectory, DIRECTORY_PREFIX));
      return new ScratchStorage(directory);
    } catch (error) {
      throw new StorageError(`Cannot create scratch directory in ${parentDirectory}`, parentDirectory, { cause: error });
    }
  }

  allocate(label: string): SegmentScratch {
    return new SegmentScratch(this.directory, label);
  }

  async dispose(): Promise<void> {
    try {
      await fs.rm(this.directory, { recursive: true, force: true });
    } catch (error) {
      throw new StorageError(`Cannot remove scratch directory ${this.directory}`, this.directory, { cause: error });
    }
  }
}
