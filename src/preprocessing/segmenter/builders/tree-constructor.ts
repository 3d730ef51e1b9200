/**
 * Tree Constructor
 *
 * Builds the section forest from detected headings using a stack of open
 * sections, in a single document-order pass.
 */

import { Injectable, Logger } from '@nestjs/common';
import { FALLBACK_SECTION_TITLE } from '../../constants/preprocess-defaults';
import type { Heading, Section, TextSpan, TreeStatistics } from '../../types';

interface OpenSection {
  level: number;
  section: Section;
}

@Injectable()
export class TreeConstructor {
  private readonly logger = new Logger(TreeConstructor.name);

  /**
   * Build top-level sections from headings
   *
   * @param headings - Headings in document order
   * @param spans - Full document-order span stream the headings index into
   * @param lastPage - Last page number of the document
   */
  buildTree(headings: Heading[], spans: TextSpan[], lastPage: number): Section[] {
    const sections: Section[] = [];
    const stack: OpenSection[] = [];

    for (let i = 0; i < headings.length; i++) {
      const heading = headings[i];
      const nextHeading = headings[i + 1];

      const contentEnd = nextHeading ? nextHeading.spanIndex : spans.length;
      const content = this.joinContent(
        spans.slice(heading.spanIndex + 1, contentEnd),
      );

      // Ends on the page of the span right before the next heading
      const endPage = nextHeading
        ? spans[nextHeading.spanIndex - 1].page
        : lastPage;

      const section: Section = {
        title: heading.title,
        level: heading.level,
        content,
        pageRange: { start: heading.page, end: Math.max(heading.page, endPage) },
        subsections: [],
      };

      // Close sections that cannot be an ancestor
      while (stack.length > 0 && stack[stack.length - 1].level >= heading.level) {
        stack.pop();
      }

      if (stack.length === 0) {
        sections.push(section);
      } else {
        stack[stack.length - 1].section.subsections.push(section);
      }

      // Ancestors cover their subsections
      for (const open of stack) {
        open.section.pageRange.end = Math.max(
          open.section.pageRange.end,
          section.pageRange.end,
        );
      }

      stack.push({ level: heading.level, section });
    }

    this.logger.log(
      `Built section tree: ${sections.length} top-level sections from ${headings.length} headings`,
    );

    return sections;
  }

  /**
   * Single section holding the whole document, for input without headings
   *
   * @returns Empty list when every span is blank
   */
  buildFallback(spans: TextSpan[], firstPage: number, lastPage: number): Section[] {
    const content = this.joinContent(spans).trim();
    if (content.length === 0) {
      return [];
    }

    return [
      {
        title: FALLBACK_SECTION_TITLE,
        level: 1,
        content,
        pageRange: { start: firstPage, end: lastPage },
        subsections: [],
      },
    ];
  }

  calculateStatistics(sections: Section[]): TreeStatistics {
    let totalSections = 0;
    let maxDepth = 0;

    const stack: Array<{ section: Section; depth: number }> = sections.map(
      (section) => ({ section, depth: 1 }),
    );

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }
      totalSections++;
      maxDepth = Math.max(maxDepth, entry.depth);
      for (const child of entry.section.subsections) {
        stack.push({ section: child, depth: entry.depth + 1 });
      }
    }

    return {
      totalSections,
      topLevelSections: sections.length,
      maxDepth,
    };
  }

  private joinContent(spans: TextSpan[]): string {
    return spans
      .map((span) => span.text)
      .filter((text) => text.trim().length > 0)
      .join('\n');
  }
}
