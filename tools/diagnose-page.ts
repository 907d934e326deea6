/**
 * Diagnose the classification of a single page: every block, every
 * candidate with its score and fate, and why each block was consumed.
 *
 * Usage: npx tsx tools/diagnose-page.ts manual.pdf 12 [--json]
 */

import fs from 'fs';
import path from 'path';
import { formatBBox } from '../src/model/BBox';
import type { Block } from '../src/model/types';
import { classifyPages } from '../src/classifier/DocumentClassifier';
import { RuleScore } from '../src/classifier/Score';
import { serializeClassificationResult } from '../src/classifier/Serializer';
import { loadDocument } from '../src/extractor/DocumentLoader';

function describeBlock(block: Block): string {
  switch (block.kind) {
    case 'text':
      return `text "${block.text}" size=${block.fontSize?.toFixed(1) ?? '?'}`;
    case 'drawing':
      return `drawing items=${block.items.length}${block.fillColor ? ' filled' : ''}${block.strokeColor ? ' stroked' : ''}`;
    case 'image':
      return `image ${block.imageId ?? ''}`;
  }
}

async function diagnose(pdfPath: string, pageNumber: number, asJson: boolean): Promise<void> {
  const absPath = path.resolve(pdfPath);
  const data = new Uint8Array(fs.readFileSync(absPath));
  const doc = await loadDocument(data);
  const page = doc.pages.find(p => p.pageNumber === pageNumber);
  if (page === undefined) {
    throw new RangeError(`Page ${pageNumber} is out of range (1-${doc.numPages})`);
  }

  const { results } = classifyPages([page], { pagesForHints: doc.pages });
  const result = results[0];

  if (asJson) {
    process.stdout.write(serializeClassificationResult(result));
    return;
  }

  console.log(`Diagnosing: ${path.basename(absPath)} page ${pageNumber} of ${doc.numPages}\n`);

  console.log(`--- Blocks (${page.blocks.length}) ---`);
  for (const block of page.blocks) {
    const record = result.getConsumption(block);
    const label = result.getLabel(block);
    const fate = record === null ? 'unclaimed' : label ?? `${record.reason} of #${record.candidateId ?? '-'}`;
    console.log(`  #${String(block.id).padStart(4)} ${formatBBox(block.bbox).padEnd(32)} ${describeBlock(block).padEnd(40)} ${fate}`);
  }

  console.log(`\n--- Candidates ---`);
  for (const candidate of result.allCandidates()) {
    const status = candidate.isWinner ? 'WIN ' : candidate.failureReason ? 'lost' : '    ';
    console.log(
      `  ${status} #${String(candidate.id).padStart(3)} ${candidate.label.padEnd(13)} ${candidate.score.toFixed(3)} ${formatBBox(candidate.bbox)}`,
    );
    if (candidate.scoreDetails instanceof RuleScore) {
      const parts = Object.entries(candidate.scoreDetails.components).map(([name, s]) => `${name}=${s.toFixed(2)}`);
      console.log(`         ${parts.join(' ')}`);
    }
    if (candidate.failureReason) console.log(`         ${candidate.failureReason}`);
  }

  console.log('\n--- Warnings ---');
  for (const warning of result.warnings) console.log(`  ${warning}`);

  const steps = result.page?.steps ?? [];
  console.log(`\nSteps: ${steps.map(s => `${s.stepNumber.value} (${s.partsList?.parts.length ?? 0} parts)`).join(', ') || 'none'}`);
}

const pdfPath = process.argv[2] ?? '';
const pageNumber = Number(process.argv[3] ?? '1');
diagnose(pdfPath, pageNumber, process.argv.includes('--json')).catch(err => {
  console.error('Fatal error:', err);
  process.exit(1);
});
