import type { PageData } from '../../model/types';
import type { ClassifierHints } from '../types';
import { computeFontSizeHints, emptyFontSizeHints } from './FontSizeHints';
import { PageHints } from './PageHints';

export function emptyHints(): ClassifierHints {
  return { fontSizes: emptyFontSizeHints(), pages: PageHints.empty() };
}

export function buildClassifierHints(pages: readonly PageData[]): ClassifierHints {
  return { fontSizes: computeFontSizeHints(pages), pages: PageHints.fromPages(pages) };
}
