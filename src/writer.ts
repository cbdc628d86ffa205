/**
 * Writes generated pages, assets and site files
 */

import { writeFile, mkdir, rm, cp, stat } from 'fs/promises';
import { dirname } from 'path';
import matter from 'gray-matter';
import { isNodeError } from './errors.js';
import { SiteLayout } from './layout.js';
import { Note } from './types.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class SiteWriter {
  private layout: SiteLayout;
  private mathMethod: string;

  constructor(layout: SiteLayout, mathMethod = 'katex') {
    this.layout = layout;
    this.mathMethod = mathMethod;
  }

  /**
   * Delete everything previously generated and start from an empty directory
   */
  async resetOutput(): Promise<void> {
    const outputDir = this.layout.getOutputDir();
    await rm(outputDir, { recursive: true, force: true });
    await mkdir(outputDir, { recursive: true });
  }

  /**
   * Front matter block for a generated page
   */
  frontmatter(note: Note): Record<string, unknown> {
    return {
      title: note.title,
      date: note.date ?? null,
      tags: [...note.tags],
      format: { html: { 'html-math-method': this.mathMethod } }
    };
  }

  renderPage(note: Note, body: string): string {
    return matter.stringify(`\n${body}`, this.frontmatter(note));
  }

  async writeNote(note: Note, body: string): Promise<string> {
    await mkdir(dirname(note.outputPath), { recursive: true });
    await writeFile(note.outputPath, this.renderPage(note, body), 'utf-8');
    return note.outputPath;
  }

  /**
   * Copy asset folders that sit beside the source next to the generated page,
   * replacing whatever copy was there before
   */
  async copyAssets(note: Note): Promise<string[]> {
    const copied: string[] = [];

    for (const { source, target } of this.layout.assetDirsFor(note)) {
      if (!(await isDirectory(source))) {
        continue;
      }

      await rm(target, { recursive: true, force: true });
      await cp(source, target, { recursive: true });
      copied.push(target);
    }

    return copied;
  }

  async writeSiteConfig(text: string): Promise<string> {
    const path = this.layout.getSiteConfigPath();
    await writeFile(path, text, 'utf-8');
    return path;
  }

  async writeHomepage(text: string): Promise<string> {
    const path = this.layout.getHomepagePath();
    await writeFile(path, text, 'utf-8');
    return path;
  }
}
