/** What the uploader needs to know about a payload before sending it. */
export interface SourceMetadata {
  /** Name the file is stored under in the batch. */
  readonly fileName: string;
  /** Size in bytes. `0` means the payload is empty and will be rejected. */
  readonly fileSize: number;
  readonly mimeType: string;
  /** Local path for file-backed sources; used in upload results and messages. */
  readonly filePath?: string;
}

/**
 * Port for a payload uploaded into a batch (local file, in-memory buffer, ...).
 *
 * `metadata()` is called first and must fail without reading the payload when
 * the source does not exist, so validation never costs a full read.
 */
export interface DataSource {
  metadata(): Promise<SourceMetadata>;
  /** Read the full payload. The platform takes one PUT per file. */
  read(): Promise<Buffer>;
}
