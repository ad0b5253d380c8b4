import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectContentType } from '../detectContentType.js';

/** Upload source holding its payload in memory, e.g. records serialised by the caller. */
export class BufferSource implements DataSource {
  private readonly data: Buffer;
  private readonly fileName: string;
  private readonly mimeType: string;

  constructor(data: string | Buffer, fileName: string, mimeType?: string) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.fileName = fileName;
    this.mimeType = mimeType ?? detectContentType(fileName);
  }

  metadata(): Promise<SourceMetadata> {
    return Promise.resolve({
      fileName: this.fileName,
      fileSize: this.data.length,
      mimeType: this.mimeType,
    });
  }

  read(): Promise<Buffer> {
    return Promise.resolve(this.data);
  }
}
