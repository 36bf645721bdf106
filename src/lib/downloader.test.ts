import * as fs from 'fs';
import * as path from 'path';
import { downloadFile } from './downloader';
import { TEST_WORK_DIR } from '../test-setup';

const URL = 'https://downloads.example.test/Miniforge3-Linux-x86_64.sh';

describe('downloadFile', () => {
  const destination = path.join(TEST_WORK_DIR, 'Miniforge3-Linux-x86_64.sh');

  it('should write the response body to the destination', async () => {
    const fetchSpy = jest.spyOn(global, 'fetch').mockResolvedValue(new Response('#!/bin/sh\necho miniforge\n'));

    await downloadFile(URL, destination);

    expect(fs.readFileSync(destination, 'utf-8')).toBe('#!/bin/sh\necho miniforge\n');
    expect(fs.existsSync(`${destination}.partial`)).toBe(false);
    expect(fetchSpy).toHaveBeenCalledWith(URL, { redirect: 'follow' });
  });

  it('should fail on an HTTP error without leaving a file behind', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('not found', { status: 404 }));

    await expect(downloadFile(URL, destination)).rejects.toThrow(`Failed to download ${URL}: HTTP 404`);
    expect(fs.readdirSync(TEST_WORK_DIR)).toEqual([]);
  });

  it('should remove the partial file when the body cannot be written', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('payload'));
    const missingDir = path.join(TEST_WORK_DIR, 'missing', 'installer.sh');

    await expect(downloadFile(URL, missingDir)).rejects.toThrow(/ENOENT/);
    expect(fs.existsSync(`${missingDir}.partial`)).toBe(false);
    expect(fs.existsSync(missingDir)).toBe(false);
  });
});
