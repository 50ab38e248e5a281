import { writeFile } from 'node:fs/promises';

export interface DownloadOptions {
  /** 0 disables the timeout. */
  timeoutMs: number;
}

export interface Downloader {
  download(url: string, destination: string, options: DownloadOptions): Promise<void>;
}

/** Downloads with the global fetch, following redirects. Throws on HTTP errors. */
export const fetchDownloader: Downloader = {
  async download(url, destination, { timeoutMs }) {
    const response = await fetch(url, {
      redirect: 'follow',
      signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText} for ${url}`);
    }
    const body = Buffer.from(await response.arrayBuffer());
    await writeFile(destination, body);
  },
};
