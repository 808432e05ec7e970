/**
 * Plaintext article sections
 *
 * Extracts returned with `explaintext=1` mark level-2 headings as a line of
 * the form `== Heading ==` surrounded by newlines.
 */

/** A named section of an article */
export interface Section {
  heading: string;
  text: string;
}

/** Name of the section before the first heading */
export const LEAD_HEADING = 'Lead';

// Level-2 only: the first captured character may not be '=' so `=== X ===` is skipped
const HEADING_SOURCE = String.raw`\n *={2} *([^=].+?) *={2} *\n`;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Level-2 heading names in order of appearance
 */
export function getHeadings(text: string): string[] {
  return Array.from(text.matchAll(new RegExp(HEADING_SOURCE, 'g')), (match) => match[1] ?? '');
}

/**
 * Split an article into sections at its level-2 headings
 *
 * The first section is always named `Lead` and may be empty.
 */
export function splitText(text: string): Section[] {
  // A capturing split alternates: [lead, heading1, body1, heading2, body2, ...]
  const parts = text.split(new RegExp(HEADING_SOURCE));
  const sections: Section[] = [{ heading: LEAD_HEADING, text: parts[0] ?? '' }];
  for (let i = 1; i < parts.length; i += 2) {
    sections.push({ heading: parts[i] ?? '', text: parts[i + 1] ?? '' });
  }
  return sections;
}

/**
 * Reassemble sections into article text
 *
 * The lead keeps no heading line; every other section is introduced by
 * `\n== Heading ==\n`, so `splitText(joinSections(s))` yields `s` again.
 */
export function joinSections(sections: readonly Section[]): string {
  return sections
    .map((section, i) =>
      i === 0 && section.heading === LEAD_HEADING ? section.text : `\n== ${section.heading} ==\n${section.text}`
    )
    .join('');
}

/**
 * Drop everything from each of the named headings onward
 *
 * Headings are matched literally. Names that do not occur are ignored.
 */
export function cutAtHeadings(text: string, headings: readonly string[]): string {
  let result = text;
  for (const heading of headings) {
    const pattern = new RegExp(String.raw`\n *={2} *${escapeRegExp(heading)} *={2} *\n`);
    const match = pattern.exec(result);
    if (match) {
      result = result.slice(0, match.index);
    }
  }
  return result;
}

export function cutArticlesAtHeadings(texts: readonly string[], headings: readonly string[]): string[] {
  return texts.map((text) => cutAtHeadings(text, headings));
}
