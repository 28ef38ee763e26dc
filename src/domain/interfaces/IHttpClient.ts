/**
 * Per-request options
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

/**
 * Fields shared by every response
 */
export interface ResponseInfo {
  url: string;
  finalUrl: string;
  status: number;
  statusText: string;
  contentType: string;
  headers: Record<string, string>;
}

export interface TextResponse extends ResponseInfo {
  body: string;
}

export interface StreamResponse extends ResponseInfo {
  contentLength?: number;
  body: NodeJS.ReadableStream;
}

/**
 * Transport used by the fetcher and the downloader. Implementations throw
 * NetworkError on connection failures and timeouts and HttpError on
 * non-2xx statuses; they never retry.
 */
export interface IHttpClient {
  getText(url: string, options?: RequestOptions): Promise<TextResponse>;
  getStream(url: string, options?: RequestOptions): Promise<StreamResponse>;
}
