// File-backed storage of the copied session cookie

import * as fs from 'fs/promises';
import * as path from 'path';
import { Credential } from '../../types/index';

/**
 * Split a `<cookieName>=<cookieValue>` line on its first `=`
 */
export function parseCredentialLine(line: string): Credential | null {
  const trimmed = line.trim();
  const separator = trimmed.indexOf('=');
  if (separator <= 0) {
    return null;
  }

  return {
    name: trimmed.slice(0, separator),
    value: trimmed.slice(separator + 1)
  };
}

export function formatCredentialLine(credential: Credential): string {
  return `${credential.name}=${credential.value}`;
}

export class CredentialStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getPath(): string {
    return this.filePath;
  }

  /**
   * Read the stored line; null when no file exists
   */
  async loadLine(): Promise<string | null> {
    try {
      const content = await fs.readFile(this.filePath, 'utf8');
      return content.split(/\r?\n/, 1)[0];
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  async load(): Promise<Credential | null> {
    const line = await this.loadLine();
    return line === null ? null : parseCredentialLine(line);
  }

  async save(credential: Credential): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${formatCredentialLine(credential)}\n`, { mode: 0o600 });
    console.log(`CredentialStore: Saved session cookie to ${this.filePath}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
