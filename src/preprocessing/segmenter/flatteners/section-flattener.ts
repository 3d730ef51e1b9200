/**
 * Section Flattener
 *
 * Pre-order walk of the section forest. Returned arrays hold the original
 * Section references; the hierarchy itself is left as is.
 */

import { Injectable } from '@nestjs/common';
import type { Section } from '../../types';

@Injectable()
export class SectionFlattener {
  flatten(sections: Section[]): Section[] {
    const flat: Section[] = [];
    const stack: Section[] = [...sections].reverse();

    while (stack.length > 0) {
      const section = stack.pop();
      if (!section) {
        break;
      }
      flat.push(section);
      for (let i = section.subsections.length - 1; i >= 0; i--) {
        stack.push(section.subsections[i]);
      }
    }

    return flat;
  }

  /**
   * First section (pre-order) whose title matches, case-insensitive
   */
  findByTitle(sections: Section[], title: string): Section | undefined {
    const wanted = title.toLowerCase();
    return this.flatten(sections).find(
      (section) => section.title.toLowerCase() === wanted,
    );
  }
}
