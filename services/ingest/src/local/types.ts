export interface LocalFile {
  filePath: string;
  /** Path below the source directory, always with "/" separators. */
  relativePath: string;
  fileName: string;
  extension: string;
  content: string;
  modifiedAt: Date;
}
