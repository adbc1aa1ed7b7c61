import { LOB } from '../types.js';
import { CV_REMARK_KEYWORDS, LOB_KEYWORD_MASKS, LOB_KEYWORDS } from '../library/constants.js';

/**
 * One entry of the ordered matcher list.
 */
export interface LobMatcher {
  lob: LOB;
  keywords: readonly string[];
  source: 'segment' | 'remarks';
}

/**
 * Which matcher decided the LOB, for traceability.
 */
export interface LobMatch {
  lob: LOB;
  keyword?: string;
  source?: 'segment' | 'remarks';
}

export const LOB_MATCHERS: readonly LobMatcher[] = [
  ...LOB_KEYWORDS.map(([lob, keywords]): LobMatcher => ({ lob, keywords, source: 'segment' })),
  { lob: LOB.CV, keywords: CV_REMARK_KEYWORDS, source: 'remarks' },
];

export function classifyLob(segmentText: string, remarksText = ''): LOB {
  return explainLob(segmentText, remarksText).lob;
}

/**
 * Walks the matchers in order. Segment keywords are tried before the
 * remarks fallback; no hit at all is `Unknown`.
 */
export function explainLob(segmentText: string, remarksText = ''): LobMatch {
  const texts = {
    segment: segmentText.toUpperCase(),
    remarks: remarksText.toUpperCase(),
  };

  for (const matcher of LOB_MATCHERS) {
    const keyword = findKeyword(texts[matcher.source], matcher.keywords);
    if (keyword !== undefined) {
      return { lob: matcher.lob, keyword, source: matcher.source };
    }
  }

  return { lob: LOB.Unknown };
}

/**
 * First keyword contained in `text`. Text must be upper-cased. Masked words
 * are blanked out first, so "SC" hits "SCOOTER" but not "SCHOOL".
 */
export function findKeyword(text: string, keywords: readonly string[]): string | undefined {
  return keywords.find((keyword) => unmasked(text, keyword).includes(keyword));
}

function unmasked(text: string, keyword: string): string {
  const masks = LOB_KEYWORD_MASKS.get(keyword);
  if (!masks) return text;
  return masks.reduce((result, word) => result.split(word).join(' '), text);
}
