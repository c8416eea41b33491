/**
 * @file DocumentLoader - Corpus directory loader
 * @description Walks a directory and turns each supported file into a source document.
 *   Plain text and Markdown are chunked later; Q/A JSON becomes one pre-built chunk per pair;
 *   any other JSON is flattened to text.
 * @depends zod, Chunker (sentence counting and language detection)
 */

import { readFile, readdir } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { createLogger } from '../../LoggerService';
import type { Chunk, SourceDocument } from '../types';
import { detectLanguage, splitSentences } from './Chunker';

const logger = createLogger('DocumentLoader');

const TEXT_EXTENSIONS = new Set(['.txt', '.md']);
const JSON_EXTENSION = '.json';

/** Fields read in this order when a JSON object looks like an article */
const TEXT_FIELDS = ['title', 'content', 'text', 'description'] as const;

// ====== Q/A Schemas ======

const qaPairSchema = z
  .object({
    question: z.string().trim().min(1),
    answer: z.string().trim().min(1),
  })
  .passthrough();

const qaFileSchema = z.union([
  z.array(qaPairSchema).nonempty(),
  z.object({ qa_pairs: z.array(qaPairSchema).nonempty() }).passthrough(),
]);

type QaPair = z.infer<typeof qaPairSchema>;

// ====== Helpers ======

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Paragraphs of readable text, depth first, in document order */
export function flattenJson(value: unknown): string[] {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? [trimmed] : [];
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return [String(value)];
  }
  if (Array.isArray(value)) {
    return value.flatMap(flattenJson);
  }
  if (!isRecord(value)) {
    return [];
  }

  const article = TEXT_FIELDS.flatMap((field) => {
    const fieldValue = value[field];
    return typeof fieldValue === 'string' && fieldValue.trim() ? [fieldValue.trim()] : [];
  });
  if (article.length > 0) {
    return [article.join('\n')];
  }

  return Object.entries(value).flatMap(([key, nested]) => {
    const parts = flattenJson(nested);
    return parts.length > 0 ? [`${key}: ${parts.join(' ')}`] : [];
  });
}

export function qaPairsToChunks(pairs: readonly QaPair[], sourceFile: string): Chunk[] {
  return pairs.map((pair, index) => {
    const question = pair.question.trim();
    const answer = pair.answer.trim();
    const text = `Question: ${question}\nAnswer: ${answer}`;
    return {
      id: `${sourceFile}#${index}`,
      text,
      sourceFile,
      index,
      language: detectLanguage(text),
      metadata: {
        length: text.length,
        sentenceCount: splitSentences(text).length,
        isQaPair: true,
        question,
        answer,
      },
    };
  });
}

/** Relative path with forward slashes, stable across platforms */
function toSourceName(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

// ====== Loader ======

export class DocumentLoader {
  /**
   * Load every supported file below `dir`, skipping dot-files and dot-directories.
   * Unreadable or malformed files are logged and skipped.
   */
  async loadDirectory(dir: string): Promise<SourceDocument[]> {
    const root = path.resolve(dir);
    const files = (await this.walk(root))
      .map((filePath) => ({ filePath, sourceFile: toSourceName(root, filePath) }))
      .sort((a, b) => (a.sourceFile < b.sourceFile ? -1 : a.sourceFile > b.sourceFile ? 1 : 0));

    const documents: SourceDocument[] = [];
    for (const { filePath, sourceFile } of files) {
      const document = await this.loadFile(filePath, sourceFile);
      if (document) {
        documents.push(document);
      }
    }

    logger.info(`[DocumentLoader] Loaded ${documents.length} document(s) from ${root}`, {
      files: files.length,
    });
    return documents;
  }

  async loadFile(filePath: string, sourceFile: string): Promise<SourceDocument | null> {
    const ext = path.extname(filePath).toLowerCase();

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      logger.warn(`[DocumentLoader] Skipping unreadable file: ${sourceFile}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    if (TEXT_EXTENSIONS.has(ext)) {
      return raw.trim() ? { kind: 'text', sourceFile, text: raw } : null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      logger.warn(`[DocumentLoader] Skipping invalid JSON: ${sourceFile}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const qa = qaFileSchema.safeParse(data);
    if (qa.success) {
      const pairs = Array.isArray(qa.data) ? qa.data : qa.data.qa_pairs;
      logger.debug(`[DocumentLoader] ${sourceFile}: ${pairs.length} Q/A pair(s)`);
      return { kind: 'chunks', sourceFile, chunks: qaPairsToChunks(pairs, sourceFile) };
    }

    const text = flattenJson(data).join('\n\n');
    return text ? { kind: 'text', sourceFile, text } : null;
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith('.')) {
        continue;
      }
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (entry.isFile()) {
        const ext = path.extname(entry.name).toLowerCase();
        if (TEXT_EXTENSIONS.has(ext) || ext === JSON_EXTENSION) {
          files.push(fullPath);
        }
      }
    }

    return files;
  }
}
