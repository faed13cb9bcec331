import { readdir, readFile } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { Inject, Injectable, Logger } from '@nestjs/common';

import { APP_CONFIG, type AppConfig } from '../config/app.config';
import type { SourceDocument } from './chunker';

export const LOADABLE_EXTENSIONS = new Set(['.txt', '.md']);

@Injectable()
export class DocumentLoader {
  private readonly logger = new Logger(DocumentLoader.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get folder() {
    return this.config.knowledgeBase.dataFolder;
  }

  /**
   * Reads every .txt / .md file directly inside the folder, sorted by name.
   * Form feeds in a file mark page boundaries. A missing folder yields [].
   */
  async loadFolder(folder = this.folder): Promise<SourceDocument[]> {
    let entries: string[];
    try {
      entries = await readdir(folder);
    } catch (e) {
      if (isMissing(e)) {
        this.logger.warn(`Data folder ${folder} does not exist`);
        return [];
      }
      throw e;
    }

    const files = entries
      .filter((f) => LOADABLE_EXTENSIONS.has(extname(f).toLowerCase()))
      .sort();
    if (!files.length) {
      this.logger.warn(`No documents found in ${folder}`);
      return [];
    }

    const docs: SourceDocument[] = [];
    for (const file of files) {
      const text = await readFile(join(folder, file), 'utf8');
      docs.push({ name: file, text });
    }
    this.logger.log(`Loaded ${docs.length} documents from ${folder}`);
    return docs;
  }
}

function isMissing(e: unknown): boolean {
  return (
    typeof e === 'object' &&
    e !== null &&
    'code' in e &&
    (e.code === 'ENOENT' || e.code === 'ENOTDIR')
  );
}
