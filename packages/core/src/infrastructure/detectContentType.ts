/** Content type sent with a file upload, inferred from the file extension. */
export function detectContentType(fileNameOrPath: string): string {
  const ext = fileNameOrPath.includes('.') ? fileNameOrPath.split('.').pop()?.toLowerCase() : undefined;
  switch (ext) {
    case 'parquet':
      return 'application/vnd.apache.parquet';
    case 'avro':
      return 'application/avro';
    case 'json':
      return 'application/json';
    case 'jsonl':
    case 'ndjson':
      return 'application/x-ndjson';
    case 'csv':
      return 'text/csv';
    case 'tsv':
      return 'text/tab-separated-values';
    case 'txt':
      return 'text/plain';
    case 'gz':
      return 'application/gzip';
    case 'zip':
      return 'application/zip';
    default:
      return 'application/octet-stream';
  }
}
