/**
 * Tests for SiteWriter
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { readFile, readdir, mkdir, writeFile, access } from 'fs/promises';
import { join } from 'path';
import matter from 'gray-matter';
import { SiteWriter } from '../writer.js';
import { SiteLayout } from '../layout.js';
import { Note } from '../types.js';
import { cleanupTempRoot, createTempRoot, writeTree } from './fixtures.js';

describe('SiteWriter', () => {
  let root: string;
  let layout: SiteLayout;
  let writer: SiteWriter;

  function noteAt(slug: string, fields: Partial<Note> = {}): Note {
    return {
      title: 'Newton\'s Laws',
      date: '2024-01-05',
      tags: ['classical', 'motion'],
      topic: 'physics',
      course: 'mechanics',
      slug,
      sourcePath: join(root, 'notes_staging', 'physics', 'mechanics', `${slug}.tex`),
      outputPath: join(root, 'notes', 'physics', 'mechanics', `${slug}.qmd`),
      ...fields
    };
  }

  beforeEach(async () => {
    root = await createTempRoot();
    layout = new SiteLayout({
      projectRoot: root,
      stagingDir: join(root, 'notes_staging'),
      outputDir: join(root, 'notes'),
      assetFolders: ['images', 'assets']
    });
    writer = new SiteWriter(layout);
  });

  afterEach(async () => {
    await cleanupTempRoot(root);
  });

  describe('resetOutput', () => {
    it('should remove previous output and recreate the directory', async () => {
      await writeTree(join(root, 'notes'), { 'old/stale.qmd': 'stale' });

      await writer.resetOutput();

      expect(await readdir(join(root, 'notes'))).toEqual([]);
    });

    it('should create the directory when missing', async () => {
      await writer.resetOutput();
      await expect(access(join(root, 'notes'))).resolves.toBeUndefined();
    });
  });

  describe('writeNote', () => {
    it('should write front matter followed by the converted body', async () => {
      const note = noteAt('newtons-laws');
      const path = await writer.writeNote(note, 'Body with $x^2$.\n');

      expect(path).toBe(join(root, 'notes', 'physics', 'mechanics', 'newtons-laws.qmd'));

      const page = await readFile(path, 'utf-8');
      expect(page.startsWith('---\ntitle: Newton\'s Laws\n')).toBe(true);
      expect(page.endsWith('---\n\nBody with $x^2$.\n')).toBe(true);

      const { data } = matter(page);
      expect(data).toEqual({
        title: 'Newton\'s Laws',
        date: '2024-01-05',
        tags: ['classical', 'motion'],
        format: { html: { 'html-math-method': 'katex' } }
      });
    });

    it('should write a null date and empty tags', async () => {
      const note = noteAt('scratch', { title: 'Scratch', date: undefined, tags: [] });
      const page = await readFile(await writer.writeNote(note, 'x'), 'utf-8');

      const { data } = matter(page);
      expect(data.date).toBeNull();
      expect(data.tags).toEqual([]);
    });

    it('should overwrite an earlier page for the same slug', async () => {
      await writer.writeNote(noteAt('intro', { title: 'Intro' }), 'first');
      const path = await writer.writeNote(noteAt('intro', { title: 'Intro!' }), 'second');

      const page = await readFile(path, 'utf-8');
      expect(matter(page).data.title).toBe('Intro!');
      expect(page.endsWith('\nsecond\n')).toBe(true);
    });
  });

  describe('copyAssets', () => {
    it('should copy asset folders next to the generated page', async () => {
      const note = noteAt('waves');
      const courseDir = join(root, 'notes_staging', 'physics', 'mechanics');
      await writeTree(courseDir, {
        'images/wave.png': 'png-bytes',
        'images/sub/diagram.svg': '<svg/>',
        'assets/data.csv': 'a,b'
      });

      const copied = await writer.copyAssets(note);

      const outDir = join(root, 'notes', 'physics', 'mechanics');
      expect(copied).toEqual([join(outDir, 'images'), join(outDir, 'assets')]);
      expect(await readFile(join(outDir, 'images', 'wave.png'), 'utf-8')).toBe('png-bytes');
      expect(await readFile(join(outDir, 'images', 'sub', 'diagram.svg'), 'utf-8')).toBe('<svg/>');
      expect(await readFile(join(outDir, 'assets', 'data.csv'), 'utf-8')).toBe('a,b');
    });

    it('should replace a previous copy', async () => {
      const note = noteAt('waves');
      await writeTree(join(root, 'notes_staging', 'physics', 'mechanics'), { 'images/new.png': 'new' });
      await writeTree(join(root, 'notes', 'physics', 'mechanics'), { 'images/old.png': 'old' });

      await writer.copyAssets(note);

      expect(await readdir(join(root, 'notes', 'physics', 'mechanics', 'images'))).toEqual(['new.png']);
    });

    it('should skip missing folders and plain files', async () => {
      const note = noteAt('waves');
      const courseDir = join(root, 'notes_staging', 'physics', 'mechanics');
      await mkdir(courseDir, { recursive: true });
      await writeFile(join(courseDir, 'assets'), 'not a folder', 'utf-8');

      expect(await writer.copyAssets(note)).toEqual([]);
    });
  });

  describe('site files', () => {
    it('should write the site configuration and homepage at the project root', async () => {
      const configPath = await writer.writeSiteConfig('project:\n  type: website\n');
      const homePath = await writer.writeHomepage('# Home\n');

      expect(configPath).toBe(join(root, '_quarto.yml'));
      expect(homePath).toBe(join(root, 'index.qmd'));
      expect(await readFile(configPath, 'utf-8')).toBe('project:\n  type: website\n');
      expect(await readFile(homePath, 'utf-8')).toBe('# Home\n');
    });
  });
});
