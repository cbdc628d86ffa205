/**
 * Homepage (index.qmd): the most recent notes, newest first
 */

import { sortNotes } from './catalog.js';
import { SiteLayout } from './layout.js';
import { Note, SiteSettings } from './types.js';

export const DEFAULT_HOMEPAGE_LIMIT = 30;

export function recentNotes(notes: readonly Note[], limit = DEFAULT_HOMEPAGE_LIMIT): Note[] {
  return sortNotes(notes, 'desc').slice(0, Math.max(0, limit));
}

export function formatEntry(note: Note, layout: SiteLayout): string {
  const date = note.date ? ` — ${note.date}` : '';
  return `- [${note.title}](${layout.siteHref(note.outputPath)})${date}`;
}

export function renderHomepage(
  notes: readonly Note[],
  layout: SiteLayout,
  site: SiteSettings
): string {
  const lines = [
    '---',
    'title: Home',
    'format:',
    '  html:',
    '    toc: false',
    '---',
    '',
    `# ${site.title}`,
    '',
    'Browse using the sidebar (Topic → Class → Note).',
    '',
    '## Recent notes',
    ''
  ];

  for (const note of recentNotes(notes, site.homepageLimit)) {
    lines.push(formatEntry(note, layout));
  }

  return lines.join('\n') + '\n';
}
