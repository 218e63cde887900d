import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { FilesConfig } from '../config';
import { config } from '../config';
import { logger } from '../config/logger';
import { ProcessingError, ValidationError, isAppError } from '../errors';
import type { ProcessedFileSet, UploadedFile } from '../types';
import { settleAllWithConcurrency } from '../utils/concurrency';
import { EXTRACTABLE_EXTENSIONS, decodeUtf8, extractDocumentText } from './document-text.service';

export type FileProcessorOptions = Pick<
  FilesConfig,
  'maxFileSizeBytes' | 'allowedExtensions' | 'tempDir' | 'concurrency' | 'extractDocumentText'
>;

/** Lower-cased extension of the base name without the dot; '' for dotfiles and bare names. */
export function fileExtension(filename: string): string {
  return path.extname(filename).toLowerCase().replace(/^\./, '');
}

/**
 * Validates uploaded files and turns them into prompt context.
 * Validation runs over the whole batch before any file is touched; reads then
 * fan out under a concurrency limit and are joined back in input order.
 */
export class FileProcessorService {
  constructor(private readonly options: FileProcessorOptions) {}

  async processFiles(files: readonly UploadedFile[]): Promise<ProcessedFileSet> {
    if (files.length === 0) {
      return { names: [], combinedText: '' };
    }

    for (const file of files) {
      this.validateFile(file);
    }

    const results = await settleAllWithConcurrency(files, this.options.concurrency, (file) =>
      this.processSingleFile(file)
    );

    const names: string[] = [];
    const contents: string[] = [];
    for (const [index, result] of results.entries()) {
      if (!result.ok) {
        const filename = files[index].filename;
        logger.error('File processing failed', { filename, error: errorMessage(result.error) });
        if (isAppError(result.error)) throw result.error;
        throw new ProcessingError(`Failed to process file ${filename}.`, result.error);
      }
      names.push(files[index].filename);
      contents.push(result.value);
    }

    return { names, combinedText: contents.join('\n') };
  }

  private validateFile(file: UploadedFile): void {
    if (!file.filename) {
      throw new ValidationError('empty filename');
    }
    const extension = fileExtension(file.filename);
    if (!this.options.allowedExtensions.has(extension)) {
      throw new ValidationError(`disallowed extension: ${extension}`);
    }
  }

  private async processSingleFile(file: UploadedFile): Promise<string> {
    if (file.content.length > this.options.maxFileSizeBytes) {
      throw new ValidationError('size exceeds limit');
    }

    const extension = fileExtension(file.filename);
    const tempPath = path.join(this.options.tempDir, `upload_${uuidv4()}${extension ? `.${extension}` : ''}`);
    try {
      let buffer: Buffer;
      try {
        await fs.writeFile(tempPath, file.content);
        buffer = await fs.readFile(tempPath);
      } catch (e) {
        throw new ProcessingError(`Failed to read file ${file.filename}.`, e);
      }

      if (this.options.extractDocumentText && EXTRACTABLE_EXTENSIONS.has(extension)) {
        try {
          return await extractDocumentText(extension, buffer);
        } catch (e) {
          throw new ProcessingError(`Failed to extract text from ${file.filename}.`, e);
        }
      }
      return decodeUtf8(buffer);
    } finally {
      await removeTempFile(tempPath);
    }
  }
}

async function removeTempFile(tempPath: string): Promise<void> {
  try {
    await fs.rm(tempPath, { force: true });
  } catch (e) {
    logger.warn('Could not remove temporary file', { tempPath, error: errorMessage(e) });
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

let instance: FileProcessorService | null = null;

export function getFileProcessor(): FileProcessorService {
  if (!instance) {
    instance = new FileProcessorService(config.files);
  }
  return instance;
}
