export interface IHttpClient {
  /**
   * Descarga un recurso de texto (playlists).
   * Cualquier respuesta no exitosa o fallo de red se señala con un TransportError.
   */
  getText(url: string): Promise<string>;

  /**
   * Descarga el cuerpo completo de la respuesta (claves de cifrado).
   */
  getBytes(url: string): Promise<Buffer>;

  /**
   * Escribe el cuerpo de la respuesta en `destination` y devuelve los bytes escritos.
   */
  download(url: string, destination: string): Promise<number>;
}
