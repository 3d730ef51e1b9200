/**
 * Functional Grouper Service
 *
 * Classifies every section (subsections included) into the functional
 * groups of a keyword taxonomy by case-folded substring matching.
 * Multi-label: a section may land in several groups. Sections matching no
 * group go to a trailing "unclassified" group.
 */

import { Injectable, Logger } from '@nestjs/common';
import { UNCLASSIFIED_GROUP_NAME } from '../constants/preprocess-defaults';
import { GroupingError, PreprocessError, toError } from '../errors';
import { SectionFlattener } from '../segmenter/flatteners/section-flattener';
import type {
  FunctionalGroup,
  GroupingResult,
  KeywordTaxonomy,
  Section,
} from '../types';
import { DEFAULT_KEYWORD_TAXONOMY } from './keyword-taxonomy';

@Injectable()
export class FunctionalGrouperService {
  private readonly logger = new Logger(FunctionalGrouperService.name);

  constructor(private readonly sectionFlattener: SectionFlattener) {}

  /**
   * Group sections by functional category
   *
   * @param sections - Top-level sections; subsections are classified too
   * @param taxonomy - Ordered group → keywords mapping
   * @returns Groups in taxonomy order, "unclassified" last
   */
  group(
    sections: Section[],
    taxonomy: KeywordTaxonomy = DEFAULT_KEYWORD_TAXONOMY,
  ): GroupingResult {
    try {
      const flatSections = this.sectionFlattener.flatten(sections);

      this.logger.log(
        `Starting functional grouping for ${flatSections.length} sections across ${taxonomy.size} groups`,
      );

      const groupSections = new Map<string, Section[]>();
      const groupKeywords = new Map<string, Set<string>>();
      const unclassified: Section[] = [];

      for (const section of flatSections) {
        const matches = this.matchSection(section, taxonomy);

        if (matches.size === 0) {
          unclassified.push(section);
          continue;
        }

        for (const [name, keywords] of matches) {
          const members = groupSections.get(name) ?? [];
          members.push(section);
          groupSections.set(name, members);

          const matched = groupKeywords.get(name) ?? new Set<string>();
          keywords.forEach((keyword) => matched.add(keyword));
          groupKeywords.set(name, matched);
        }
      }

      const groups: FunctionalGroup[] = [];
      for (const [name, keywords] of taxonomy) {
        const members = groupSections.get(name);
        if (!members) {
          continue;
        }
        const matched = groupKeywords.get(name) ?? new Set<string>();
        groups.push({
          name,
          sections: members,
          // report in taxonomy order
          keywords: keywords.filter((keyword) => matched.has(keyword)),
        });
      }

      if (unclassified.length > 0) {
        this.logger.log(`Found ${unclassified.length} unclassified sections`);
        groups.push({
          name: UNCLASSIFIED_GROUP_NAME,
          sections: unclassified,
          keywords: [],
        });
      }

      this.logger.log(`Created ${groups.length} functional groups`);

      return { groups, unclassifiedCount: unclassified.length };
    } catch (error) {
      if (error instanceof PreprocessError) {
        throw error;
      }
      const err = toError(error);
      this.logger.error(`Functional grouping failed: ${err.message}`);
      throw new GroupingError(err.message, err);
    }
  }

  /**
   * @returns Group name → keywords found in the section's title and content
   */
  matchSection(
    section: Section,
    taxonomy: KeywordTaxonomy,
  ): Map<string, string[]> {
    const text = `${section.title} ${section.content}`.toLowerCase();
    const matches = new Map<string, string[]>();

    for (const [name, keywords] of taxonomy) {
      const found = keywords.filter((keyword) => text.includes(keyword));
      if (found.length > 0) {
        matches.set(name, found);
      }
    }

    return matches;
  }
}
