import * as fs from 'fs';
import * as path from 'path';
import { DocumentSourceError } from '../types/errors';
import type { DocumentSource } from './document-source';

/**
 * Document stored on the local filesystem
 */
export class FileDocumentSource implements DocumentSource {
  public readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async read(): Promise<string> {
    if (!fs.existsSync(this.location)) {
      throw new DocumentSourceError('file not found', this.location);
    }

    try {
      return await fs.promises.readFile(this.location, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DocumentSourceError(`failed to read file: ${reason}`, this.location);
    }
  }
}
