/**
 * End-to-end site build: discover, index, convert, emit
 */

import { relative, sep } from 'path';
import { findCollisions, lastWriteWins } from './catalog.js';
import { DEFAULT_CONVERSION, PandocConverter } from './converter.js';
import { BuildError } from './errors.js';
import { renderHomepage } from './homepage.js';
import { SiteLayout } from './layout.js';
import { buildSiteConfig, renderSiteConfig } from './navigation.js';
import { NoteParser } from './parser.js';
import { PerfMonitor } from './perf.js';
import { NoteScanner } from './scanner.js';
import { SiteWriter } from './writer.js';
import {
  BuildConfig,
  BuildSummary,
  ConversionOptions,
  Converter,
  Logger,
  Note,
  SlugCollision
} from './types.js';

export interface SiteBuilderOptions {
  converter?: Converter;
  conversion?: ConversionOptions;
  parser?: NoteParser;
  logger?: Logger;
  perf?: PerfMonitor;
}

export class SiteBuilder {
  private config: BuildConfig;
  private layout: SiteLayout;
  private scanner: NoteScanner;
  private writer: SiteWriter;
  private converter: Converter;
  private conversion: ConversionOptions;
  private logger: Logger;
  private perf: PerfMonitor;

  constructor(config: BuildConfig, options: SiteBuilderOptions = {}) {
    this.config = config;
    this.layout = new SiteLayout({
      projectRoot: config.projectRoot,
      stagingDir: config.stagingDir,
      outputDir: config.outputDir,
      assetFolders: config.site.assetFolders
    });
    this.scanner = new NoteScanner(this.layout, options.parser);
    this.writer = new SiteWriter(this.layout, config.site.mathMethod);
    this.converter = options.converter || new PandocConverter(config.pandocCommand);
    this.conversion = options.conversion || DEFAULT_CONVERSION;
    this.logger = options.logger || console;
    this.perf = options.perf || new PerfMonitor(config.perf, message => this.logger.error(message));
  }

  async build(): Promise<BuildSummary> {
    await this.perf.timeAsync('check-converter', () => this.converter.ensureAvailable());

    const files = await this.perf.timeAsync('discover', () => this.scanner.findSourceFiles());
    if (files.length === 0) {
      throw new BuildError(
        'environment',
        `No .tex files found under ${this.layout.getStagingDir()}`,
        this.layout.getStagingDir()
      );
    }

    const indexed = await this.perf.timeAsync('index', () => this.scanner.buildIndex(files));
    const collisions = findCollisions(indexed);
    const notes = this.resolveCollisions(indexed, collisions);

    await this.writer.resetOutput();

    for (const note of indexed) {
      await this.perf.timeAsync('convert', () => this.emitNote(note), this.relativeSource(note));
    }

    const homepagePath = await this.perf.timeAsync('homepage', () =>
      this.writer.writeHomepage(renderHomepage(notes, this.layout, this.config.site))
    );
    const siteConfigPath = await this.perf.timeAsync('site-config', () =>
      this.writer.writeSiteConfig(
        renderSiteConfig(buildSiteConfig(notes, this.layout, this.config.site))
      )
    );

    const outputLabel = this.layout.siteHref(this.layout.getOutputDir());
    this.logger.log(
      `Generated ${notes.length} notes into ${outputLabel}/ and wrote _quarto.yml + index.qmd`
    );

    return {
      notes,
      outputDir: this.layout.getOutputDir(),
      siteConfigPath,
      homepagePath,
      collisions
    };
  }

  /**
   * Abort on colliding slugs, or warn and keep the last note for each page
   */
  private resolveCollisions(notes: Note[], collisions: SlugCollision[]): Note[] {
    if (collisions.length === 0) {
      return notes;
    }

    const lines = collisions.map(collision => {
      const sources = collision.sources.map(source => relative(this.config.stagingDir, source));
      return `${this.layout.siteHref(collision.outputPath)} <- ${sources.join(', ')}`;
    });

    if (this.config.onSlugCollision === 'error') {
      throw new BuildError(
        'collision',
        `Notes share an output page:\n${lines.join('\n')}`,
        collisions[0].outputPath
      );
    }

    for (const line of lines) {
      this.logger.error(`[build] slug collision, last note wins: ${line}`);
    }
    return lastWriteWins(notes);
  }

  private async emitNote(note: Note): Promise<void> {
    const body = await this.converter.convert(note.sourcePath, this.conversion);
    await this.writer.writeNote(note, body);
    await this.writer.copyAssets(note);
  }

  private relativeSource(note: Note): string {
    return relative(this.config.stagingDir, note.sourcePath).split(sep).join('/');
  }
}
