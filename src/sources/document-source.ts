/**
 * A place an environments or defaults document can be read from
 */
export interface DocumentSource {
  /** Human-readable location, used as the origin of parsed entries */
  readonly location: string;

  /**
   * Reads the whole document as text
   *
   * @throws {DocumentSourceError} When the document cannot be read
   */
  read(): Promise<string>;
}
