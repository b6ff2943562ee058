// Download and extraction of submission archives

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as tar from 'tar';
import { APIClient } from '../api/api-client';
import { IOError } from '../errors/index';

export class ArchiveService {
  private client: APIClient;

  constructor(client: APIClient) {
    this.client = client;
  }

  /**
   * Fetch a .tgz archive through the session and unpack it into destDir
   */
  async download(url: string, destDir: string): Promise<string> {
    const response = await this.client.get(url);
    if (!response.ok) {
      throw new IOError(`Archive download failed with HTTP ${response.status}: ${url}`);
    }

    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'brute-archive-'));
    const archivePath = path.join(tempDir, 'submission.tgz');

    try {
      await fs.writeFile(archivePath, Buffer.from(await response.arrayBuffer()));
      await fs.mkdir(destDir, { recursive: true });
      await tar.x({ file: archivePath, cwd: destDir, strict: true });
      console.log(`ArchiveService: Extracted ${url} into ${destDir}`);
      return destDir;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new IOError(`Could not extract archive from ${url}: ${reason}`, error);
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }
}
