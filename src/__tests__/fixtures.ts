/**
 * Shared test fixtures: temporary staging trees, note records and a stub converter
 */

import { mkdir, mkdtemp, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { SiteLayout } from '../layout.js';
import { BuildError } from '../errors.js';
import { ConversionOptions, Converter, Note } from '../types.js';

export const PROJECT_ROOT = '/site';

export function createLayout(projectRoot = PROJECT_ROOT): SiteLayout {
  return new SiteLayout({
    projectRoot,
    stagingDir: join(projectRoot, 'notes_staging'),
    outputDir: join(projectRoot, 'notes'),
    assetFolders: ['images', 'assets']
  });
}

/**
 * Note record as the scanner would build it under PROJECT_ROOT
 */
export function makeNote(fields: Partial<Note> & { title: string }): Note {
  const topic = fields.topic ?? 'physics';
  const course = fields.course ?? 'mechanics';
  const slug = fields.slug ?? fields.title.toLowerCase().replace(/[^a-z0-9]+/g, '-');

  return {
    date: undefined,
    tags: [],
    topic,
    course,
    slug,
    sourcePath: join(PROJECT_ROOT, 'notes_staging', topic, course, `${slug}.tex`),
    outputPath: join(PROJECT_ROOT, 'notes', topic, course, `${slug}.qmd`),
    ...fields
  };
}

export async function createTempRoot(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'texnotes-'));
}

export async function cleanupTempRoot(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * Write files given as `relative path -> content` below a directory
 */
export async function writeTree(base: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const fullPath = join(base, relPath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, 'utf-8');
  }
}

export function texSource(meta: Record<string, string>, body = '\\section{Intro}\nText.'): string {
  const header = Object.entries(meta).map(([key, value]) => `% ${key}: ${value}`);
  return [...header, '', body, ''].join('\n');
}

/**
 * Converter that never leaves the process
 */
export class StubConverter implements Converter {
  calls: Array<{ sourcePath: string; options: ConversionOptions }> = [];
  available = true;
  failOn?: string;

  async ensureAvailable(): Promise<void> {
    if (!this.available) {
      throw new BuildError('environment', 'pandoc not found. Install pandoc and ensure it\'s on PATH.');
    }
  }

  async convert(sourcePath: string, options: ConversionOptions): Promise<string> {
    this.calls.push({ sourcePath, options });
    if (this.failOn && sourcePath.endsWith(this.failOn)) {
      throw new BuildError('conversion', `Pandoc failed for ${sourcePath}\n\nSTDERR:\nboom`, sourcePath);
    }
    return `Converted body of ${sourcePath.split(/[\\/]/).pop()}\n`;
  }
}
