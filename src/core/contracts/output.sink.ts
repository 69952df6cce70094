export interface IOutputSink {
  /** Destino, para logs y mensajes de error. */
  readonly location: string;

  /**
   * Añade al final de la salida el contenido del archivo `source` y devuelve
   * los bytes añadidos.
   */
  append(source: string): Promise<number>;

  close(): Promise<void>;
}
