/**
 * @file build-index.ts - Index build command
 * @description Loads a corpus directory and replaces the active index
 * @depends commander, RagService
 */

import * as path from 'node:path';
import { Command } from 'commander';
import { fail, interruptSignal, withEngine } from '../utils/engine';
import { Logger } from '../utils/logger';

export function createBuildIndexCommand(): Command {
  const command = new Command('build-index');

  command
    .description('Build the retrieval index from .txt, .md and .json files')
    .argument('<dir>', 'Corpus directory')
    .action(async (dir: string) => {
      const interrupt = interruptSignal();
      const sourceDir = path.resolve(dir);

      try {
        await withEngine(
          async ({ rag, config }) => {
            Logger.info(`Indexing ${sourceDir}`);
            Logger.field('Embedding', `${config.embedding.provider}/${config.embedding.model}`);
            Logger.field('Database', config.indexing.dbPath);

            const result = await rag.buildIndex(sourceDir, interrupt.signal);

            Logger.success('Index built');
            Logger.field('Collection', result.collection);
            Logger.field('Documents', result.documentCount);
            Logger.field('Chunks', result.chunkCount);
            Logger.field('Vocabulary', result.vocabularySize);
          },
          { skipInitialize: true }
        );
      } catch (error) {
        fail(error);
      } finally {
        interrupt.dispose();
      }
    });

  return command;
}
