#!/usr/bin/env node
/**
 * CLI tool to enhance a collections file outside the server
 *
 * Usage:
 *   npm run enhance -- <collections.json> [--user <userId>]
 *
 * Writes the enhanced artifact into the user's collections directory
 * (user from --user, else from the file).
 */

import { realpathSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getExportConfig } from '../config/exportConfig.js';
import { Logger } from '../crawler/komoot/utils/logger.js';
import { createServices } from '../services/index.js';
import { enhanceCollections } from '../workers/enhancementWorker.js';

const logger = new Logger('EnhanceCLI');

export interface EnhanceCliArgs {
  file: string;
  userId?: string;
}

export function parseArgs(argv: string[]): EnhanceCliArgs | null {
  let file: string | undefined;
  let userId: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--user' || arg === '-u') {
      userId = argv[++i];
    } else if (arg.startsWith('--user=')) {
      userId = arg.slice('--user='.length);
    } else if (!file) {
      file = arg;
    }
  }

  return file ? { file, ...(userId ? { userId } : {}) } : null;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error('Usage: npm run enhance -- <collections.json> [--user <userId>]');
    process.exit(1);
  }

  const config = getExportConfig();
  const services = createServices(config);
  const artifact = await services.manager.loadArtifact(path.resolve(args.file));
  const userId = args.userId ?? artifact.user_id;

  console.log(`🔍 Enhancing ${artifact.collections.length} collection(s) for user ${userId}...\n`);

  let done = 0;
  const { collections, stats } = await enhanceCollections(artifact.collections, {
    resolver: services.resolver,
    tourPoolMax: config.tourPoolMax,
    collectionPoolMax: config.collectionPoolMax,
    log: message => logger.info(message),
    onCollectionDone: collection => {
      done++;
      logger.info(`[${done}/${artifact.collections.length}] ${collection.name} ${collection.is_enhanced ? '(enhanced)' : '(basic)'}`);
    },
  });

  const saved = await services.manager.save(collections, userId, true);

  console.log(`\n✅ Enhancement completed!`);
  console.log(`   Collections enhanced: ${stats.enhancedCollections}`);
  console.log(`   Collections skipped: ${stats.skippedCollections}`);
  console.log(`   Tours resolved: ${stats.resolvedTours}`);
  console.log(`   Tours failed: ${stats.failedTours}`);
  console.log(`   Output: ${saved.aggregatePath}`);
}

if (process.argv[1] && realpathSync(process.argv[1]) === realpathSync(fileURLToPath(import.meta.url))) {
  main().catch(error => {
    logger.error('Enhancement failed:', error);
    process.exit(1);
  });
}
