/**
 * Pattern Heading Detector
 *
 * Recognizes headings by their numbering or markup:
 * "1. Title", "1.1 Title", "1.1.1 Title", "## Title", "가. Title", "[1] Title"
 */

import { Injectable } from '@nestjs/common';

export interface HeadingMatch {
  level: number;
  title: string;
}

// Evaluated in order; group 1 = numbering, group 2 = title
export const HEADING_PATTERNS: readonly RegExp[] = [
  /^(\d+)\.\s+(.+)$/,
  /^(\d+\.\d+)\.?\s+(.+)$/,
  /^(\d+\.\d+\.\d+)\.?\s+(.+)$/,
  /^(#{1,6})\s+(.+)$/,
  /^([가-힣])\.\s+(.+)$/,
  /^\[(\d+)\]\s+(.+)$/,
];

@Injectable()
export class PatternHeadingDetector {
  /**
   * Match trimmed span text against the enumeration styles
   *
   * @returns Level and title, or null when no style matches
   */
  match(text: string): HeadingMatch | null {
    const trimmed = text.trim();

    for (const pattern of HEADING_PATTERNS) {
      const match = pattern.exec(trimmed);
      if (!match) {
        continue;
      }

      const [, numbering, title] = match;
      return {
        level: this.determineLevel(numbering),
        title: title.trim(),
      };
    }

    return null;
  }

  /**
   * "1.1.1" → 3, "##" → 2, anything else → 1
   */
  determineLevel(numbering: string): number {
    if (numbering.includes('.')) {
      return numbering.split('.').length;
    }

    if (numbering.startsWith('#')) {
      return numbering.length;
    }

    return 1;
  }
}
