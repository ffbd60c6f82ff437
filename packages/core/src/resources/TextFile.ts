/**
 * TextFile - a resource holding the contents of a text file in memory
 *
 * Properties:
 * - filename (string, required): path to read, relative to the working directory
 * - encoding (string, optional): Node buffer encoding, 'utf-8' by default
 *
 * initialize() fails when filename is missing, the encoding is unknown, or
 * the file cannot be read. Edits made with appendText() stay in memory.
 */

import { readFileSync } from 'fs';
import type { PropertyList, Resource } from '@reliquary/types';
import { getString } from '../properties/Property.js';

export class TextFile implements Resource {
  static readonly typeName = 'TextFile';

  private filename = '';
  private text = '';

  initialize(properties: PropertyList): boolean {
    const filename = getString(properties, 'filename');
    if (filename === null || filename.length === 0) return false;

    const encoding = getString(properties, 'encoding') ?? 'utf-8';
    if (!Buffer.isEncoding(encoding)) return false;

    try {
      this.text = readFileSync(filename, { encoding });
    } catch {
      return false;
    }
    this.filename = filename;
    return true;
  }

  getFilename(): string {
    return this.filename;
  }

  getText(): string {
    return this.text;
  }

  appendText(text: string): void {
    this.text += text;
  }

  /**
   * Number of lines; a trailing newline does not start a new line.
   */
  lineCount(): number {
    if (this.text.length === 0) return 0;
    const lines = this.text.split('\n');
    return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
  }
}
