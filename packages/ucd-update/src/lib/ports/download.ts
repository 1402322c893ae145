/**
 * Abstraction for fetching remote text files.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /**
   * GET `url` and decode the body as strict UTF-8.
   * Rejects with a CLIError on transport failures, non-2xx statuses and invalid UTF-8.
   */
  fetchText(url: string): Promise<string>;
}
