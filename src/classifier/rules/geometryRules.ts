/**
 * Geometry Rules
 *
 * Position-based rules. Coordinates are top-left origin, so "bottom" means
 * large y.
 */

import { bboxArea, bboxCenter, bboxHeight, bboxWidth, fullyInside, intersectionArea } from '../../model/BBox';
import type { Rule, RuleOptions } from './Rule';

/**
 * Gate on the block's centre lying in the bottom `ratio` of the page.
 * With `invert` the gate passes everything outside that band.
 */
export function inBottomBandFilter(ratio: number, invert = false, options: RuleOptions = {}): Rule {
  return {
    name: options.name ?? (invert ? 'outside_bottom_band' : 'in_bottom_band'),
    weight: 0,
    required: true,
    calculate(block, ctx) {
      const page = ctx.pageData.bbox;
      const threshold = page.y1 - ratio * bboxHeight(page);
      const inBand = bboxCenter(block.bbox).y >= threshold;
      return inBand !== invert ? 1 : 0;
    },
  };
}

/** Gate on the block's centre lying in the top-left `ratio` of both page dimensions */
export function inTopLeftRegionFilter(ratio: number, options: RuleOptions = {}): Rule {
  return {
    name: options.name ?? 'in_top_left',
    weight: 0,
    required: true,
    calculate(block, ctx) {
      const page = ctx.pageData.bbox;
      const center = bboxCenter(block.bbox);
      const inside =
        center.x <= page.x0 + ratio * bboxWidth(page) && center.y <= page.y0 + ratio * bboxHeight(page);
      return inside ? 1 : 0;
    },
  };
}

/** exp(-d / scale), d = distance from the block centre to the nearer bottom corner */
export function cornerDistanceRule(scale: number, options: RuleOptions = {}): Rule {
  return {
    name: options.name ?? 'corner_distance',
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      const page = ctx.pageData.bbox;
      const c = bboxCenter(block.bbox);
      const toLeft = Math.hypot(c.x - page.x0, c.y - page.y1);
      const toRight = Math.hypot(c.x - page.x1, c.y - page.y1);
      return Math.exp(-Math.min(toLeft, toRight) / scale);
    },
  };
}

/** exp(-d / (diag / 4)), d = distance from the block centre to the top-left corner */
export function topLeftPositionRule(options: RuleOptions = {}): Rule {
  return {
    name: options.name ?? 'top_left_position',
    weight: options.weight ?? 1,
    required: options.required ?? false,
    calculate(block, ctx) {
      const page = ctx.pageData.bbox;
      const c = bboxCenter(block.bbox);
      const diag = Math.hypot(bboxWidth(page), bboxHeight(page));
      if (diag === 0) return null;
      return Math.exp(-Math.hypot(c.x - page.x0, c.y - page.y0) / (0.25 * diag));
    },
  };
}

/**
 * Gate out blocks lying fully inside an image on the same page. Images
 * covering at least `backgroundCoverage` of the page are page backgrounds,
 * not artwork, and do not gate anything.
 */
export function outsideImagesFilter(backgroundCoverage: number, options: RuleOptions = {}): Rule {
  return {
    name: options.name ?? 'outside_images',
    weight: 0,
    required: true,
    calculate(block, ctx) {
      const page = ctx.pageData.bbox;
      const pageArea = bboxArea(page);
      for (const other of ctx.pageData.blocks) {
        if (other.kind !== 'image' || other.id === block.id) continue;
        if (pageArea > 0 && intersectionArea(other.bbox, page) / pageArea >= backgroundCoverage) continue;
        if (fullyInside(block.bbox, other.bbox)) return 0;
      }
      return 1;
    },
  };
}
