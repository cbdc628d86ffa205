/**
 * Build configuration from environment variables
 */

import { isAbsolute, relative, resolve, sep } from 'path';
import { BuildError } from './errors.js';
import { DEFAULT_HOMEPAGE_LIMIT } from './homepage.js';
import { BuildConfig, CollisionPolicy, SiteSettings } from './types.js';

export const DEFAULT_SITE: SiteSettings = {
  title: 'Personal Notes',
  theme: 'cosmo',
  css: 'styles.css',
  mathMethod: 'katex',
  homepageLimit: DEFAULT_HOMEPAGE_LIMIT,
  assetFolders: ['images', 'assets']
};

export const DEFAULT_STAGING_DIR = 'notes_staging';
export const DEFAULT_OUTPUT_DIR = 'notes';

type Env = Record<string, string | undefined>;

function parseCollisionPolicy(value: string | undefined): CollisionPolicy {
  if (value === undefined || value === '' || value === 'error') {
    return 'error';
  }
  if (value === 'warn') {
    return 'warn';
  }
  throw new BuildError(
    'environment',
    `TEXNOTES_ON_COLLISION must be "error" or "warn", got: ${value}`
  );
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * The output directory is wiped on every build, so it may not hold the
 * project root or the sources
 */
function checkOutputDir(projectRoot: string, stagingDir: string, outputDir: string): void {
  if (isWithin(outputDir, projectRoot)) {
    throw new BuildError(
      'environment',
      `Output directory must be below the project root: ${outputDir}`,
      outputDir
    );
  }
  if (isWithin(outputDir, stagingDir)) {
    throw new BuildError(
      'environment',
      `Output directory must not contain the staging directory: ${outputDir}`,
      outputDir
    );
  }
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): BuildConfig {
  const projectRoot = resolve(cwd, env.TEXNOTES_ROOT || '.');
  const stagingDir = resolve(projectRoot, env.TEXNOTES_STAGING || DEFAULT_STAGING_DIR);
  const outputDir = resolve(projectRoot, env.TEXNOTES_OUTPUT || DEFAULT_OUTPUT_DIR);
  checkOutputDir(projectRoot, stagingDir, outputDir);

  return {
    projectRoot,
    stagingDir,
    outputDir,
    pandocCommand: env.TEXNOTES_PANDOC || 'pandoc',
    onSlugCollision: parseCollisionPolicy(env.TEXNOTES_ON_COLLISION),
    perf: env.TEXNOTES_PERF === 'true',
    site: {
      ...DEFAULT_SITE,
      title: env.TEXNOTES_SITE_TITLE || DEFAULT_SITE.title
    }
  };
}
