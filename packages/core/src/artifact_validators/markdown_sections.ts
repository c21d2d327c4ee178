/**
 * Helpers for reading `## ` level sections out of Markdown documents.
 */

const SECTION_PREFIX = '## ';

function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

export function sectionName(line: string): string | null {
  const trimmed = line.trim();
  return trimmed.startsWith(SECTION_PREFIX) ? trimmed.slice(SECTION_PREFIX.length).trim() : null;
}

/**
 * Names of every `## ` heading, in document order.
 */
export function findSections(content: string): string[] {
  const sections: string[] = [];
  for (const line of splitLines(content)) {
    const name = sectionName(line);
    if (name !== null) sections.push(name);
  }
  return sections;
}

export function hasSection(sections: string[], wanted: string): boolean {
  const target = wanted.toLowerCase();
  return sections.some(section => section.toLowerCase() === target);
}

/**
 * Required sections whose heading is followed by nothing but blank lines
 * or deeper headings before the next `## ` heading.
 * @returns Section names as written in the document
 */
export function findEmptySections(content: string, sectionsToCheck: string[]): string[] {
  const wanted = new Set(sectionsToCheck.map(section => section.toLowerCase()));
  const lines = splitLines(content);
  const empty: string[] = [];

  lines.forEach((line, index) => {
    const name = sectionName(line);
    if (name === null || !wanted.has(name.toLowerCase())) return;

    let hasContent = false;
    for (const next of lines.slice(index + 1)) {
      const trimmed = next.trim();
      if (trimmed.startsWith(SECTION_PREFIX)) break;
      if (trimmed !== '' && !trimmed.startsWith('#')) {
        hasContent = true;
        break;
      }
    }
    if (!hasContent) empty.push(name);
  });

  return empty;
}

export function baseName(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts[parts.length - 1] ?? filePath;
}

export function titleCase(value: string): string {
  return value
    .split(/\s+/)
    .filter(word => word !== '')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function countMatches(content: string, pattern: RegExp): number {
  return Array.from(content.matchAll(pattern)).length;
}
