/**
 * Metadata parser for LaTeX note files
 *
 * Notes carry their metadata as leading comment lines:
 *
 *   % title: Newton's Laws
 *   % date: 2024-01-05
 *   % tags: classical, motion
 */

import { basename, extname } from 'path';
import { NoteMetadata } from './types.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface NoteFields {
  title: string;
  date?: string;
  tags: string[];
}

export class NoteParser {
  private commentMarker: string;
  private metaLine: RegExp;

  constructor(commentMarker = '%') {
    this.commentMarker = commentMarker;
    this.metaLine = new RegExp(
      `^\\s*${escapeRegExp(commentMarker)}\\s*([A-Za-z0-9_-]+)\\s*:\\s*(.*?)\\s*$`
    );
  }

  /**
   * Read `key: value` pairs from the comment block at the top of a file.
   * Blank lines are skipped; the first other non-comment line ends the block.
   */
  parseMetadata(content: string): NoteMetadata {
    const meta: NoteMetadata = {};

    for (const line of content.split(/\r?\n/)) {
      if (line.trim() === '') {
        continue;
      }
      if (!line.trimStart().startsWith(this.commentMarker)) {
        break;
      }

      const match = this.metaLine.exec(line);
      if (match) {
        meta[match[1].toLowerCase()] = match[2];
      }
    }

    return meta;
  }

  /**
   * Resolve title, date and tags, falling back to defaults for anything missing
   */
  parseFields(content: string, filePath: string): NoteFields {
    const meta = this.parseMetadata(content);

    return {
      title: meta.title || this.deriveTitle(filePath),
      date: meta.date || undefined,
      tags: this.parseTags(meta.tags)
    };
  }

  /**
   * Title from a filename: "newtons_laws-intro.tex" -> "Newtons Laws Intro"
   */
  deriveTitle(filePath: string): string {
    const stem = basename(filePath, extname(filePath));

    const title = stem
      .replace(/[_-]/g, ' ')
      .split(/\s+/)
      .filter(word => word.length > 0)
      .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
      .join(' ');

    return title || 'Untitled';
  }

  parseTags(raw?: string): string[] {
    if (!raw) {
      return [];
    }

    return raw
      .split(',')
      .map(tag => tag.trim())
      .filter(tag => tag.length > 0);
  }
}
