/**
 * Hierarchy Validator
 *
 * Checks the section tree invariants without modifying the tree:
 * - subsection level > parent level
 * - 1 <= pageRange.start <= pageRange.end <= totalPages
 * - subsection pageRange within parent pageRange
 */

import { Injectable, Logger } from '@nestjs/common';
import type { Section } from '../../types';

@Injectable()
export class HierarchyValidator {
  private readonly logger = new Logger(HierarchyValidator.name);

  /**
   * @returns Violation messages (empty when the tree is valid)
   */
  validate(sections: Section[], totalPages: number): string[] {
    const violations: string[] = [];

    const stack: Array<{ section: Section; parent?: Section }> = sections
      .map((section) => ({ section }))
      .reverse();

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }
      const { section, parent } = entry;
      const { start, end } = section.pageRange;

      if (start < 1 || start > end || end > totalPages) {
        violations.push(
          `"${section.title}" has page range ${start}-${end} outside 1-${totalPages}`,
        );
      }

      if (parent) {
        if (section.level <= parent.level) {
          violations.push(
            `"${section.title}" (level ${section.level}) is not deeper than ` +
              `parent "${parent.title}" (level ${parent.level})`,
          );
        }
        if (start < parent.pageRange.start || end > parent.pageRange.end) {
          violations.push(
            `"${section.title}" pages ${start}-${end} exceed parent "${parent.title}" ` +
              `pages ${parent.pageRange.start}-${parent.pageRange.end}`,
          );
        }
      }

      for (let i = section.subsections.length - 1; i >= 0; i--) {
        stack.push({ section: section.subsections[i], parent: section });
      }
    }

    if (violations.length > 0) {
      this.logger.warn(
        `Found ${violations.length} hierarchy violations:\n${violations.join('\n')}`,
      );
    } else {
      this.logger.log('Section hierarchy is valid');
    }

    return violations;
  }

  isValid(sections: Section[], totalPages: number): boolean {
    return this.validate(sections, totalPages).length === 0;
  }
}
