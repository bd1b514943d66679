#!/usr/bin/env tsx
/**
 * Revision projection CLI
 *
 * Reads the tracked changes of a source .docx and writes a copy of the target
 * .docx with the same changes applied as tracked revisions.
 *
 * Usage: tsx bin/project.ts [options] <source.docx> <target.docx> [output.docx]
 *
 * Examples:
 *   tsx bin/project.ts edited.docx translation.docx                 # outputs projection-result.docx
 *   tsx bin/project.ts --matcher llm edited.docx zh.docx zh-out.docx
 */

import { readFile } from 'node:fs/promises';
import { basename, extname, dirname, join } from 'node:path';

import { projectRevisions } from '../src/wml/revision-projector';
import { writeDocumentAtomic } from '../src/core/output';
import { createConsoleLogger } from '../src/core/logger';
import { errorMessage } from '../src/core/errors';
import { loadProjectorConfig, type ProjectorConfig, type ProjectorConfigOverrides } from '../src/config';
import { LexicalMatcher } from '../src/matching/lexical-matcher';
import { LlmMatcher } from '../src/matching/llm-matcher';
import { OllamaClient } from '../src/matching/ollama-client';
import type { SemanticMatcher } from '../src/matching/types';

type MatcherKind = 'lexical' | 'llm';

interface CliOptions {
  matcher: MatcherKind;
  verbose: boolean;
  overrides: ProjectorConfigOverrides;
}

function usage(): never {
  console.error(`
Usage: tsx bin/project.ts [options] <source> <target> [output]

Apply the tracked changes of a source Word document to a target document.

Arguments:
  source  Document carrying tracked insertions and deletions (.docx)
  target  Corresponding document without them (.docx)
  output  Output file path (optional, defaults to projection-result.docx)

Options:
  --author <name>        Author for source revisions that have none
  --matcher <kind>       lexical (same language, default) or llm (Ollama)
  --model <name>         Ollama model for the llm matcher
  --language <name>      Language of the target document, for llm prompts
  --min-score <0..1>     Reject matches scoring below this
  --verbose, -v          Show detailed progress
  --help, -h             Show this help message

Examples:
  tsx bin/project.ts edited.docx copy.docx
  tsx bin/project.ts --matcher llm --language Chinese en.docx zh.docx zh-tracked.docx
`);
  process.exit(1);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    fail(`${flag} requires a value`);
  }
  return value;
}

function parseArgs(args: string[]): { options: CliOptions; positional: string[] } {
  const options: CliOptions = { matcher: 'lexical', verbose: false, overrides: {} };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--author') {
      options.overrides.author = requireValue(args, ++i, arg);
    } else if (arg === '--matcher') {
      const kind = requireValue(args, ++i, arg);
      if (kind !== 'lexical' && kind !== 'llm') {
        fail(`Unknown matcher: ${kind} (expected lexical or llm)`);
      }
      options.matcher = kind;
    } else if (arg === '--model') {
      options.overrides.ollama = { ...options.overrides.ollama, model: requireValue(args, ++i, arg) };
    } else if (arg === '--language') {
      options.overrides.targetLanguage = requireValue(args, ++i, arg);
    } else if (arg === '--min-score') {
      const raw = requireValue(args, ++i, arg);
      const score = Number(raw);
      if (Number.isNaN(score)) {
        fail(`--min-score must be a number, got "${raw}"`);
      }
      options.overrides.minScore = score;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg.startsWith('-')) {
      console.error(`Error: Unknown option: ${arg}`);
      usage();
    } else {
      positional.push(arg);
    }
  }

  return { options, positional };
}

async function readInput(filePath: string, verbose: boolean): Promise<Buffer> {
  if (extname(filePath).toLowerCase() !== '.docx') {
    fail(`Unsupported file type: ${filePath} (expected .docx)`);
  }
  if (verbose) {
    console.error(`Reading ${basename(filePath)}...`);
  }
  try {
    return await readFile(filePath);
  } catch (err) {
    fail(`Cannot read file: ${filePath}\n${errorMessage(err)}`);
  }
}

function loadConfig(overrides: ProjectorConfigOverrides): ProjectorConfig {
  try {
    return loadProjectorConfig(overrides);
  } catch (err) {
    fail(errorMessage(err));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    usage();
  }

  const { options, positional } = parseArgs(args);
  if (positional.length < 2) {
    console.error('Error: A source and a target document are required');
    usage();
  }

  const [sourcePath, targetPath, outputPath] = positional;
  const finalOutputPath = outputPath ?? join(dirname(targetPath), 'projection-result.docx');

  const config = loadConfig(options.overrides);
  const logger = createConsoleLogger('projector', { verbose: options.verbose });
  const source = await readInput(sourcePath, options.verbose);
  const target = await readInput(targetPath, options.verbose);

  const matcher: SemanticMatcher =
    options.matcher === 'llm'
      ? new LlmMatcher(new OllamaClient(config.ollama, { logger: createConsoleLogger('OllamaClient') }), {
          targetLanguage: config.targetLanguage,
          logger,
        })
      : new LexicalMatcher();

  let failed = false;
  try {
    const result = await projectRevisions(source, target, {
      matcher,
      report: (message) => console.error(message),
      logger,
      minScore: config.minScore,
      matcherTimeoutMs: config.matcherTimeoutMs,
      defaultAuthor: config.author,
    });

    if (options.verbose) {
      console.error(`Writing ${basename(finalOutputPath)}...`);
    }
    await writeDocumentAtomic(finalOutputPath, result.document);
  } catch (err) {
    console.error('Error during projection:');
    console.error(errorMessage(err));
    if (options.verbose && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    failed = true;
  } finally {
    await matcher.close?.();
  }

  if (failed) {
    process.exit(1);
  }

  console.log(finalOutputPath);
}

main().catch((err) => {
  console.error('Unexpected error:', err);
  process.exit(1);
});
