/**
 * Core types for texnotes
 */

export type NoteMetadata = Record<string, string>;

export interface Note {
  readonly title: string;
  readonly date?: string;
  readonly tags: readonly string[];
  readonly topic: string;
  readonly course: string;
  readonly slug: string;
  readonly sourcePath: string;
  readonly outputPath: string;
}

export type NoteDate =
  | { kind: 'dated'; time: number }
  | { kind: 'undated' };

export type SortDirection = 'asc' | 'desc';

export interface CourseGroup {
  course: string;
  notes: Note[];
}

export interface TopicGroup {
  topic: string;
  courses: CourseGroup[];
}

export interface SlugCollision {
  outputPath: string;
  sources: string[];
}

export type SidebarLink = { text: string; href: string };
export type SidebarSection = { section: string; contents: SidebarItem[] };
export type SidebarItem = SidebarLink | SidebarSection;

export interface SiteConfig {
  project: { type: 'website' };
  website: {
    title: string;
    sidebar: {
      style: 'docked' | 'floating';
      search: boolean;
      contents: SidebarItem[];
    };
    'page-navigation': boolean;
  };
  format: {
    html: {
      theme: string;
      css: string;
      toc: boolean;
      'html-math-method': string;
    };
  };
}

export interface SiteSettings {
  title: string;
  theme: string;
  css: string;
  mathMethod: string;
  homepageLimit: number;
  assetFolders: readonly string[];
}

export interface ConversionOptions {
  from: string;
  to: string;
  wrap: 'none' | 'auto' | 'preserve';
}

/**
 * Turns one source document into the body of a generated page.
 */
export interface Converter {
  ensureAvailable(): Promise<void>;
  convert(sourcePath: string, options: ConversionOptions): Promise<string>;
}

export type CollisionPolicy = 'error' | 'warn';

export interface BuildConfig {
  projectRoot: string;
  stagingDir: string;
  outputDir: string;
  pandocCommand: string;
  onSlugCollision: CollisionPolicy;
  perf: boolean;
  site: SiteSettings;
}

export interface BuildSummary {
  notes: Note[];
  outputDir: string;
  siteConfigPath: string;
  homepagePath: string;
  collisions: SlugCollision[];
}

export type Logger = Pick<Console, 'log' | 'error'>;
