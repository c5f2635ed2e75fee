#!/usr/bin/env node

import { Command } from 'commander';
import { registerCrawlCommand } from './commands/crawl.js';
import { registerExtractCommand } from './commands/extract.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('webcam-crawler')
    .description('Extract location, coordinates, streams and maps from webcam listing pages')
    .version('0.1.0');

  registerCrawlCommand(program);
  registerExtractCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
