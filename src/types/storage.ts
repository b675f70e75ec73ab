/**
 * Storage provider interface definitions
 */

export type ProviderName =
  | "s3"
  | "gcs"
  | "azure"
  | "b2"
  | "googledrive"
  | "onedrive"
  | "dropbox"
  | "box"
  | "mega"
  | "pcloud";

export interface StorageItem {
  key: string;
  size: number;
  lastModified?: Date;
}

export interface IStorageProvider {
  readonly name: ProviderName;

  /**
   * Upload a local file under the given key
   */
  upload(key: string, localFile: string): Promise<void>;

  /**
   * Download the object stored under key into localFile
   */
  download(key: string, localFile: string): Promise<void>;

  /**
   * List every item whose key starts with prefix. Collects all pages.
   */
  list(prefix: string): Promise<StorageItem[]>;

  delete(key: string): Promise<void>;
}

/**
 * fetch-compatible function. HTTP adapters take one so tests can answer
 * requests in process.
 */
export type HttpClient = (input: string | URL, init?: RequestInit) => Promise<Response>;
