/**
 * Deterministic JSON
 *
 * Byte-stable output for elements, manuals and classification results, so
 * two runs over the same document can be diffed directly:
 *   - `kind` first, every other key sorted as a string, integer-like keys
 *     included (the printer orders keys itself rather than trusting the
 *     engine's property order)
 *   - numbers rounded to 3 decimals, -0 written as 0
 *   - sets sorted, maps written as objects, undefined members dropped
 *   - two-space indent and a trailing newline
 */

import type { Manual, StructuredElement } from '../model/elements';
import type { ClassificationResult } from './ClassificationResult';
import { RuleScore } from './Score';

type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

const DECIMALS = 3;

function roundNumber(value: number): number | null {
  if (!Number.isFinite(value)) return null;
  const factor = 10 ** DECIMALS;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  if (a === 'kind') return -1;
  if (b === 'kind') return 1;
  return a < b ? -1 : 1;
}

/** JSON.stringify(value, null, 2) layout, with object keys in compareKeys order */
function stringify(value: Json, indent = ''): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  const inner = `${indent}  `;
  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    return `[\n${value.map(item => inner + stringify(item, inner)).join(',\n')}\n${indent}]`;
  }
  const keys = Object.keys(value).sort(compareKeys);
  if (keys.length === 0) return '{}';
  const members = keys.map(key => `${inner}${JSON.stringify(key)}: ${stringify(value[key], inner)}`);
  return `{\n${members.join(',\n')}\n${indent}}`;
}

function compareJson(a: Json, b: Json): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = stringify(a);
  const sb = stringify(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function toObject(entries: Array<[string, Json]>): { [key: string]: Json } {
  const out: { [key: string]: Json } = {};
  for (const [key, value] of entries) out[key] = value;
  return out;
}

/** Convert to plain JSON; undefined (and functions) come back as undefined */
export function toJsonValue(value: unknown): Json | undefined {
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') return undefined;
  if (value === null) return null;
  if (typeof value === 'number') return roundNumber(value);
  if (typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return value.toString();

  if (Array.isArray(value)) return value.map(item => toJsonValue(item) ?? null);
  if (value instanceof Set) {
    return [...value].map(item => toJsonValue(item) ?? null).sort(compareJson);
  }
  if (value instanceof Map) {
    const entries: Array<[string, Json]> = [];
    for (const [key, item] of value) {
      const converted = toJsonValue(item);
      if (converted !== undefined) entries.push([String(key), converted]);
    }
    return toObject(entries);
  }

  if (typeof value === 'object') {
    const entries: Array<[string, Json]> = [];
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted !== undefined) entries.push([key, converted]);
    }
    return toObject(entries);
  }
  return undefined;
}

export function serialize(value: unknown): string {
  return `${stringify(toJsonValue(value) ?? null)}\n`;
}

export function serializeElement(element: StructuredElement): string {
  return serialize(element);
}

export function serializeManual(manual: Manual): string {
  return serialize(manual);
}

/**
 * Page, warnings, every candidate (without its score internals, apart from
 * rule components) and the consumption log.
 */
export function serializeClassificationResult(result: ClassificationResult): string {
  return serialize({
    pageNumber: result.pageData.pageNumber,
    page: result.page ?? null,
    warnings: [...result.warnings],
    candidates: result.allCandidates().map(candidate => ({
      id: candidate.id,
      label: candidate.label,
      bbox: candidate.bbox,
      score: candidate.score,
      components: candidate.scoreDetails instanceof RuleScore ? candidate.scoreDetails.components : undefined,
      sourceBlockIds: candidate.sourceBlocks.map(b => b.id),
      isWinner: candidate.isWinner,
      failureReason: candidate.failureReason,
    })),
    consumption: result.consumption.entries(),
  });
}
