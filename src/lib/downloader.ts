import * as fs from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

export type DownloadFn = (url: string, destination: string) => Promise<void>;

/**
 * Fetch a URL to a file. The body goes to `<destination>.partial` first so
 * an interrupted download never looks like a finished one.
 */
export async function downloadFile(url: string, destination: string): Promise<void> {
  const response = await fetch(url, { redirect: 'follow' });
  if (!response.ok || !response.body) {
    throw new Error(`Failed to download ${url}: HTTP ${response.status}`);
  }

  const partial = `${destination}.partial`;
  try {
    await pipeline(Readable.fromWeb(response.body), fs.createWriteStream(partial));
    fs.renameSync(partial, destination);
  } catch (error) {
    fs.rmSync(partial, { force: true });
    throw error;
  }
}
