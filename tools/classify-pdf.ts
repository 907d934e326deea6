/**
 * Classify every page of an instruction manual and print the Manual as JSON.
 *
 * Usage:
 *   npx tsx tools/classify-pdf.ts manual.pdf
 *   npx tsx tools/classify-pdf.ts manual.pdf --pages 10,11 --config overrides.json --out manual.json --debug
 */

import fs from 'fs';
import path from 'path';
import { classifyPages } from '../src/classifier/DocumentClassifier';
import { loadClassifierConfig } from '../src/classifier/ClassifierConfig';
import { serializeManual } from '../src/classifier/Serializer';
import { loadDocument } from '../src/extractor/DocumentLoader';

interface Args {
  pdfPath: string;
  pages: number[] | null;
  configPath: string | null;
  outPath: string | null;
  debug: boolean;
}

function parseArgs(argv: string[]): Args {
  const args: Args = { pdfPath: '', pages: null, configPath: null, outPath: null, debug: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--pages') args.pages = (argv[++i] ?? '').split(',').map(Number).filter(n => n > 0);
    else if (arg === '--config') args.configPath = argv[++i] ?? null;
    else if (arg === '--out') args.outPath = argv[++i] ?? null;
    else if (arg === '--debug') args.debug = true;
    else args.pdfPath = arg;
  }
  if (!args.pdfPath) {
    throw new Error('Usage: classify-pdf <file.pdf> [--pages 1,2] [--config file.json] [--out file.json] [--debug]');
  }
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const overrides: unknown = args.configPath ? JSON.parse(fs.readFileSync(args.configPath, 'utf-8')) : {};
  const config = loadClassifierConfig(overrides);
  if (args.debug) config.debug = true;

  const absPath = path.resolve(args.pdfPath);
  console.error(`Classifying: ${path.basename(absPath)}`);

  const data = new Uint8Array(fs.readFileSync(absPath));
  // Hints always come from the whole document, even when only some pages are classified
  const all = await loadDocument(data);
  const pages = args.pages ? all.pages.filter(p => args.pages?.includes(p.pageNumber)) : all.pages;

  const { results, manual } = classifyPages(pages, { config, pagesForHints: all.pages });

  for (const result of results) {
    for (const warning of result.warnings) console.error(`  ${warning}`);
  }
  const stepCount = manual.pages.reduce((sum, page) => sum + page.steps.length, 0);
  console.error(`${manual.pages.length} page(s), ${stepCount} step(s)`);

  const json = serializeManual(manual);
  if (args.outPath) {
    fs.writeFileSync(args.outPath, json);
    console.error(`Wrote ${args.outPath}`);
  } else {
    process.stdout.write(json);
  }
}

main().catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
