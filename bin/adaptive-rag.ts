#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { analyzeCommand, batchCommand, retrieveCommand } from '../src/cli/commands/retrievalCommands';

function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (let i = 0; i < 10; i++) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readVersionFromPackageJson(): string {
  const pkgPath = findPackageJson(__dirname);
  if (!pkgPath) return '0.0.0';
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return '0.0.0';
  } catch (e) {
    process.stderr.write(`could not read ${pkgPath}: ${e instanceof Error ? e.message : String(e)}\n`);
    return '0.0.0';
  }
}

function main() {
  const program = new Command();
  program
    .name('adaptive-rag')
    .description('adaptive-rag: query analysis, multihop and HyDE retrieval over a LanceDB chunk table')
    .version(readVersionFromPackageJson());

  program.addCommand(analyzeCommand);
  program.addCommand(retrieveCommand);
  program.addCommand(batchCommand);
  program.parseAsync(process.argv).catch((e: unknown) => {
    process.stderr.write(`${e instanceof Error ? e.message : String(e)}\n`);
    process.exit(1);
  });
}

main();
