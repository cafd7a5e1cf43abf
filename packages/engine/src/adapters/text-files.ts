import { ResumeNotFoundError } from '@jobfit/core';
import type { DocumentSource, ResumeTextCache } from '@jobfit/core';
import { readTextIfExists, writeTextAtomic } from './fs-utils';

/** Reads the resume as plain UTF-8 text. */
export class TextFileDocumentSource implements DocumentSource {
  constructor(private readonly filePath: string) {}

  async readResumeText(): Promise<string> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) {
      throw new ResumeNotFoundError(`Resume not found at ${this.filePath}`);
    }
    return text;
  }
}

/** Flattened bullet lines, one per line. */
export class FileResumeTextCache implements ResumeTextCache {
  constructor(private readonly filePath: string) {}

  read(): Promise<string | null> {
    return readTextIfExists(this.filePath);
  }

  write(text: string): Promise<void> {
    return writeTextAtomic(this.filePath, text);
  }
}
