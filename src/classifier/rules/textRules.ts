/**
 * Text Rules
 *
 * Rules that look at the content and type size of text blocks. Every rule
 * here scores non-text blocks 0; pair them with `isKindFilter('text')` so the
 * block is gated out before the weighted mean sees it.
 */

import type { Block } from '../../model/types';
import { bboxHeight } from '../../model/BBox';
import type { Rule, RuleOptions } from './Rule';
import type { ScaleFunction } from './scoring';
import { scoreLinear } from './scoring';
import {
  extractBagNumberValue,
  extractElementId,
  extractPageNumberValue,
  extractPartCountValue,
  extractStepNumberValue,
} from '../TextExtractors';
import type { RuleContext } from '../types';

// ─── Constants ───────────────────────────────────────────────

/**
 * How often catalog element ids of each digit length occur.
 * Seven-digit ids dominate modern catalogs; four and eight digits are rare.
 */
const ELEMENT_ID_LENGTH_PROBABILITY: Readonly<Record<number, number>> = {
  4: 0.0002,
  5: 0.005,
  6: 0.0498,
  7: 0.9447,
  8: 0.0003,
};

const PAGE_NUMBER_DIGITS = /^\d{1,3}$/;
const PAGE_NUMBER_LEADING_ZERO = /^0+\d{1,3}$/;
const PAGE_NUMBER_PREFIXED = /^(?:page|p\.?)\s*\d{1,3}$/i;

// ─── Helpers ─────────────────────────────────────────────────

/** Font size of a text block, falling back to its bbox height */
export function effectiveFontSize(block: Block): number | null {
  if (block.kind !== 'text') return null;
  return block.fontSize ?? bboxHeight(block.bbox);
}

function textRule(
  defaultName: string,
  options: RuleOptions,
  scoreText: (text: string, ctx: RuleContext) => number,
): Rule {
  return {
    name: options.name ?? defaultName,
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      if (block.kind !== 'text') return 0;
      return scoreText(block.text.trim(), ctx);
    },
  };
}

// ─── Generic ─────────────────────────────────────────────────

export function regexMatchRule(pattern: RegExp, options: RuleOptions = {}): Rule {
  return textRule('regex_match', options, text => (pattern.test(text) ? 1 : 0));
}

/**
 * Scores the block's font size through the scale chosen for this page;
 * not applicable when `scaleFor` returns null.
 */
export function fontSizeMatchRule(
  scaleFor: (ctx: RuleContext) => ScaleFunction | null,
  options: RuleOptions = {},
): Rule {
  return {
    name: options.name ?? 'font_size',
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      const scale = scaleFor(ctx);
      if (scale === null) return null;
      const size = effectiveFontSize(block);
      if (size === null) return 0;
      return scale(size);
    },
  };
}

/**
 * `max(0, 1 - 2|size - target| / target)`; not applicable when the target
 * is unknown.
 */
export function targetFontSizeRule(
  target: (ctx: RuleContext) => number | null,
  options: RuleOptions = {},
): Rule {
  return {
    name: options.name ?? 'font_size',
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      const expected = target(ctx);
      if (expected === null || expected <= 0) return null;
      const size = effectiveFontSize(block);
      if (size === null) return 0;
      return Math.max(0, 1 - (2 * Math.abs(size - expected)) / expected);
    },
  };
}

/** Rewards text up to twice the reference size. */
export function largerFontRule(
  reference: (ctx: RuleContext) => number | null,
  options: RuleOptions = {},
): Rule {
  return {
    name: options.name ?? 'larger_font',
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      const ref = reference(ctx);
      if (ref === null || ref <= 0) return null;
      const size = effectiveFontSize(block);
      if (size === null) return 0;
      return scoreLinear(size / ref, 1, 2);
    },
  };
}

// ─── Label Text Rules ────────────────────────────────────────

export function pageNumberTextRule(options: RuleOptions = {}): Rule {
  return textRule('page_number_text', options, text => {
    if (PAGE_NUMBER_LEADING_ZERO.test(text)) return 0.9;
    if (PAGE_NUMBER_DIGITS.test(text)) return 1;
    if (PAGE_NUMBER_PREFIXED.test(text)) return 0.8;
    return 0;
  });
}

export function stepNumberTextRule(options: RuleOptions = {}): Rule {
  return textRule('step_number_text', options, text => (extractStepNumberValue(text) !== null ? 1 : 0));
}

export function partCountTextRule(options: RuleOptions = {}): Rule {
  return textRule('part_count_text', options, text => (extractPartCountValue(text) !== null ? 1 : 0));
}

export function bagNumberTextRule(options: RuleOptions = {}): Rule {
  return textRule('bag_number_text', options, text => (extractBagNumberValue(text) !== null ? 1 : 0));
}

/** 0.5 + 0.5 * P(digit count) for valid element ids, 0 otherwise */
export function partNumberTextRule(options: RuleOptions = {}): Rule {
  return textRule('part_number_text', options, text => {
    const id = extractElementId(text);
    if (id === null) return 0;
    return 0.5 + 0.5 * (ELEMENT_ID_LENGTH_PROBABILITY[id.length] ?? 0);
  });
}

/**
 * Compares the parsed page number to the page's position in the document.
 * `scale` maps the absolute difference to a score.
 */
export function pageNumberValueRule(scale: ScaleFunction, options: RuleOptions = {}): Rule {
  return textRule('page_value', options, (text, ctx) => {
    const value = extractPageNumberValue(text);
    if (value === null) return 0;
    return scale(Math.abs(value - ctx.pageData.pageNumber));
  });
}

export const _testExports = {
  ELEMENT_ID_LENGTH_PROBABILITY,
};
