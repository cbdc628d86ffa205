/**
 * Discovers LaTeX sources and builds the note registry
 */

import { glob } from 'glob';
import { readFile, stat } from 'fs/promises';
import { relative, sep } from 'path';
import { NoteParser } from './parser.js';
import { SiteLayout } from './layout.js';
import { BuildError, isNodeError } from './errors.js';
import { safeSegment, slugify } from './sanitize.js';
import { Note } from './types.js';

export const SOURCE_PATTERN = '**/*.tex';

/**
 * Order paths directory by directory, so "ab/x" sorts before "ab!/x"
 */
export function comparePathParts(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

export class NoteScanner {
  private layout: SiteLayout;
  private parser: NoteParser;

  constructor(layout: SiteLayout, parser?: NoteParser) {
    this.layout = layout;
    this.parser = parser || new NoteParser();
  }

  /**
   * All .tex files under the staging directory, hidden ones included,
   * sorted by path components
   */
  async findSourceFiles(): Promise<string[]> {
    const stagingDir = this.layout.getStagingDir();

    try {
      const stats = await stat(stagingDir);
      if (!stats.isDirectory()) {
        throw new BuildError('environment', `Staging path is not a directory: ${stagingDir}`, stagingDir);
      }
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        throw new BuildError('environment', `Missing staging directory: ${stagingDir}`, stagingDir);
      }
      throw error;
    }

    const files = await glob(SOURCE_PATTERN, {
      cwd: stagingDir,
      absolute: true,
      nodir: true,
      dot: true,
      windowsPathsNoEscape: true
    });

    const parts = (file: string) => relative(stagingDir, file).split(sep);
    return files.sort((a, b) => comparePathParts(parts(a), parts(b)));
  }

  /**
   * Build one note record from a source file
   */
  async loadNote(filePath: string): Promise<Note> {
    const { topic: rawTopic, course: rawCourse } = this.layout.classify(filePath);
    const content = await readFile(filePath, 'utf-8');
    const { title, date, tags } = this.parser.parseFields(content, filePath);

    const topic = safeSegment(rawTopic);
    const course = safeSegment(rawCourse);
    const slug = slugify(title);

    return Object.freeze({
      title,
      date,
      tags: Object.freeze(tags),
      topic,
      course,
      slug,
      sourcePath: filePath,
      outputPath: this.layout.outputPathFor(topic, course, slug)
    });
  }

  async buildIndex(files: readonly string[]): Promise<Note[]> {
    const notes: Note[] = [];
    for (const file of files) {
      notes.push(await this.loadNote(file));
    }
    return notes;
  }
}
