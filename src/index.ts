#!/usr/bin/env node
/**
 * CLI entry point.
 *
 *   ingest <screenplay|moodboard> <file> [title]
 *   align
 *   query <question...> [--hops N]
 *   status
 */
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { FusionService } from './service.js';
import { InsufficientContext, isFusionError } from './errors.js';
import { logger } from './utils/logger.js';
import { DOCUMENT_KINDS, type DocumentKind } from './types.js';

const USAGE = 'Use: ingest <screenplay|moodboard> <file> [title] | align | query <question...> [--hops N] | status';

const [,, command, ...args] = process.argv;

function isKind(value: string | undefined): value is DocumentKind {
  return DOCUMENT_KINDS.some((k) => k === value);
}

function print(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

function parseHops(rest: string[]): { question: string; hops?: number } {
  const words: string[] = [];
  let hops: number | undefined;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--hops') {
      const value = Number(rest[++i]);
      if (!Number.isInteger(value) || value < 0) throw new Error('--hops needs a non-negative integer');
      hops = value;
    } else if (arg !== undefined) {
      words.push(arg);
    }
  }
  return { question: words.join(' '), hops };
}

async function main(): Promise<void> {
  if (!command) {
    logger.error(`No command given. ${USAGE}`);
    process.exit(1);
  }
  const service = await FusionService.create();
  try {
    switch (command) {
      case 'ingest': {
        const [kind, file, ...titleWords] = args;
        if (!isKind(kind) || !file) throw new Error(`Usage: ingest <screenplay|moodboard> <file> [title]`);
        const content = await readFile(file);
        const title = titleWords.join(' ') || undefined;
        print(await service.ingest({ kind, title, sourceName: basename(file, extname(file)), content }));
        break;
      }
      case 'align':
        print(await service.align());
        break;
      case 'query': {
        const { question, hops } = parseHops(args);
        try {
          const answer = await service.query(question, { hops });
          process.stdout.write(answer.answer + '\n\n');
          for (const c of answer.citations) {
            process.stdout.write(`  [${c.segmentId}] ${c.documentTitle}: ${c.text.split('\n')[0] ?? ''}\n`);
          }
          if (answer.degraded) process.stdout.write('\n(model unavailable; answer built from graph facts)\n');
        } catch (err) {
          if (!(err instanceof InsufficientContext)) throw err;
          process.stdout.write(`${err.message}\n`);
          process.exitCode = 2;
        }
        break;
      }
      case 'status':
        print(service.status());
        break;
      default:
        logger.error(`Unknown command: ${command}. ${USAGE}`);
        process.exitCode = 1;
    }
  } finally {
    await service.close();
  }
}

main().catch((err: unknown) => {
  logger.error('Fatal', { err, code: isFusionError(err) ? err.code : undefined });
  process.exit(1);
});
