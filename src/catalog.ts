/**
 * Grouping and ordering of notes for the sidebar and homepage
 */

import {
  Note,
  NoteDate,
  SortDirection,
  TopicGroup,
  CourseGroup,
  SlugCollision
} from './types.js';

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a raw `YYYY-MM-DD` date. Anything else, including impossible days
 * like 2024-02-30, is undated.
 */
export function parseNoteDate(raw?: string): NoteDate {
  const match = raw ? ISO_DAY.exec(raw.trim()) : null;
  if (!match) {
    return { kind: 'undated' };
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const parsed = new Date(time);

  // Date.UTC treats years 0-99 as 1900-1999
  parsed.setUTCFullYear(year);

  if (
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    return { kind: 'undated' };
  }

  return { kind: 'dated', time: parsed.getTime() };
}

/**
 * Undated notes rank as older than every dated note, whichever way a list
 * is sorted.
 */
export function compareNoteDates(a: NoteDate, b: NoteDate): number {
  if (a.kind === 'dated' && b.kind === 'dated') {
    return a.time - b.time;
  }
  if (a.kind === b.kind) return 0;
  return a.kind === 'undated' ? -1 : 1;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Ascending order by (date, lower-cased title)
 */
export function compareNotes(a: Note, b: Note): number {
  const byDate = compareNoteDates(parseNoteDate(a.date), parseNoteDate(b.date));
  if (byDate !== 0) {
    return byDate;
  }

  return compareText(a.title.toLowerCase(), b.title.toLowerCase());
}

export function sortNotes(notes: readonly Note[], direction: SortDirection = 'asc'): Note[] {
  const sign = direction === 'asc' ? 1 : -1;
  return [...notes].sort((a, b) => sign * compareNotes(a, b));
}

/**
 * Partition notes by topic then course. Topics and courses come out in
 * name order, notes oldest first.
 */
export function groupNotes(notes: readonly Note[]): TopicGroup[] {
  const tree = new Map<string, Map<string, Note[]>>();

  for (const note of notes) {
    let courses = tree.get(note.topic);
    if (!courses) {
      courses = new Map<string, Note[]>();
      tree.set(note.topic, courses);
    }

    const bucket = courses.get(note.course);
    if (bucket) {
      bucket.push(note);
    } else {
      courses.set(note.course, [note]);
    }
  }

  return [...tree.keys()].sort(compareText).map(topic => {
    const courses = tree.get(topic) ?? new Map<string, Note[]>();
    const courseGroups: CourseGroup[] = [...courses.keys()].sort(compareText).map(course => ({
      course,
      notes: sortNotes(courses.get(course) ?? [])
    }));

    return { topic, courses: courseGroups };
  });
}

/**
 * Notes that would be written to the same page, in discovery order
 */
export function findCollisions(notes: readonly Note[]): SlugCollision[] {
  const byOutput = new Map<string, string[]>();

  for (const note of notes) {
    const sources = byOutput.get(note.outputPath) ?? [];
    sources.push(note.sourcePath);
    byOutput.set(note.outputPath, sources);
  }

  return [...byOutput.entries()]
    .filter(([, sources]) => sources.length > 1)
    .map(([outputPath, sources]) => ({ outputPath, sources }));
}

/**
 * Keep only the last note written to each page
 */
export function lastWriteWins(notes: readonly Note[]): Note[] {
  const byOutput = new Map<string, Note>();
  for (const note of notes) {
    byOutput.delete(note.outputPath);
    byOutput.set(note.outputPath, note);
  }
  return [...byOutput.values()];
}
