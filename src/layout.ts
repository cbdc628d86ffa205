/**
 * Directory layout of a notes site
 *
 *   <root>/notes_staging/<topic>/<course>/<name>.tex   sources
 *   <root>/notes/<topic>/<course>/<slug>.qmd           generated pages
 *   <root>/_quarto.yml                                 site configuration
 *   <root>/index.qmd                                   homepage
 */

import { join, relative, dirname, isAbsolute, sep } from 'path';
import { BuildError } from './errors.js';
import { Note } from './types.js';

export const SITE_CONFIG_FILE = '_quarto.yml';
export const HOMEPAGE_FILE = 'index.qmd';
export const PAGE_EXTENSION = '.qmd';

export interface LayoutPaths {
  projectRoot: string;
  stagingDir: string;
  outputDir: string;
  assetFolders: readonly string[];
}

export interface AssetDir {
  source: string;
  target: string;
}

export class SiteLayout {
  private paths: LayoutPaths;

  constructor(paths: LayoutPaths) {
    this.paths = paths;
  }

  /**
   * Raw topic and course of a source file, taken from its first two
   * directories below the staging directory
   */
  classify(sourcePath: string): { topic: string; course: string } {
    const rel = relative(this.paths.stagingDir, sourcePath);
    const parts = rel.split(sep).filter(part => part.length > 0);

    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel) || parts.length < 3) {
      throw new BuildError(
        'structure',
        `Expected ${this.paths.stagingDir}/<topic>/<course>/<file> but got: ${sourcePath}`,
        sourcePath
      );
    }

    return { topic: parts[0], course: parts[1] };
  }

  outputPathFor(topic: string, course: string, slug: string): string {
    return join(this.paths.outputDir, topic, course, `${slug}${PAGE_EXTENSION}`);
  }

  /**
   * Path of a generated file as the site references it
   */
  siteHref(absolutePath: string): string {
    return relative(this.paths.projectRoot, absolutePath).split(sep).join('/');
  }

  assetDirsFor(note: Note): AssetDir[] {
    return this.paths.assetFolders.map(folder => ({
      source: join(dirname(note.sourcePath), folder),
      target: join(dirname(note.outputPath), folder)
    }));
  }

  getStagingDir(): string {
    return this.paths.stagingDir;
  }

  getOutputDir(): string {
    return this.paths.outputDir;
  }

  getSiteConfigPath(): string {
    return join(this.paths.projectRoot, SITE_CONFIG_FILE);
  }

  getHomepagePath(): string {
    return join(this.paths.projectRoot, HOMEPAGE_FILE);
  }
}
