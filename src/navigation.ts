/**
 * Sidebar navigation and site configuration (_quarto.yml)
 */

import { dump } from 'js-yaml';
import { groupNotes } from './catalog.js';
import { SiteLayout, HOMEPAGE_FILE } from './layout.js';
import { Note, SidebarItem, SiteConfig, SiteSettings, TopicGroup } from './types.js';

function displayLabel(name: string): string {
  return name.replace(/_/g, ' ');
}

export function buildSidebar(groups: TopicGroup[], layout: SiteLayout): SidebarItem[] {
  const contents: SidebarItem[] = [{ text: 'Home', href: HOMEPAGE_FILE }];

  for (const topic of groups) {
    contents.push({
      section: displayLabel(topic.topic),
      contents: topic.courses.map(course => ({
        section: displayLabel(course.course),
        contents: course.notes.map(note => ({
          text: note.title,
          href: layout.siteHref(note.outputPath)
        }))
      }))
    });
  }

  return contents;
}

export function buildSiteConfig(
  notes: readonly Note[],
  layout: SiteLayout,
  site: SiteSettings
): SiteConfig {
  return {
    project: { type: 'website' },
    website: {
      title: site.title,
      sidebar: {
        style: 'docked',
        search: true,
        contents: buildSidebar(groupNotes(notes), layout)
      },
      'page-navigation': true
    },
    format: {
      html: {
        theme: site.theme,
        css: site.css,
        toc: true,
        'html-math-method': site.mathMethod
      }
    }
  };
}

export function renderSiteConfig(config: SiteConfig): string {
  return dump(config, { sortKeys: false, lineWidth: 120 });
}
