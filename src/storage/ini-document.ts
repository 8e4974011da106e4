import { EOL } from 'node:os';

const SECTION_HEADER = /^\[([^\]]*)\]$/;

export interface IniEntryLine {
  kind: 'entry';
  key: string;
  value: string;
}

/** Comments and lines without `=`, written back as they were read. */
export interface IniTextLine {
  kind: 'text';
  text: string;
}

export type IniLine = IniEntryLine | IniTextLine;

function isComment(line: string): boolean {
  return line.startsWith(';') || line.startsWith('#');
}

// ---------------------------------------------------------------------------
// IniSection
// ---------------------------------------------------------------------------

/**
 * One named block of `key=value` lines.
 *
 * Values are the raw text after the first `=`, trimmed. Nothing is unquoted,
 * unescaped or cut at `;`/`#`, so keys other tools wrote come back unchanged.
 */
export class IniSection {
  readonly name: string;
  private readonly lines: IniLine[] = [];
  private readonly entries = new Map<string, IniEntryLine>();

  constructor(name: string, entries: Iterable<[string, string]> = []) {
    this.name = name;
    for (const [key, value] of entries) {
      this.set(key, value);
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  getString(key: string): string | undefined {
    return this.entries.get(key)?.value;
  }

  /** Replace the value in place, or append a new line. */
  set(key: string, value: string): void {
    const existing = this.entries.get(key);
    if (existing) {
      existing.value = value;
      return;
    }
    const line: IniEntryLine = { kind: 'entry', key, value };
    this.lines.push(line);
    this.entries.set(key, line);
  }

  /** Remove every line for `key`, duplicates included. */
  delete(key: string): boolean {
    if (!this.entries.delete(key)) {
      return false;
    }
    for (let i = this.lines.length - 1; i >= 0; i--) {
      const line = this.lines[i];
      if (line.kind === 'entry' && line.key === key) {
        this.lines.splice(i, 1);
      }
    }
    return true;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  toObject(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, line] of this.entries) {
      out[key] = line.value;
    }
    return out;
  }

  isEmpty(): boolean {
    return this.lines.length === 0;
  }

  /** @internal Used by the parser for duplicate keys, comments and bare lines. */
  appendLine(line: IniLine): void {
    this.lines.push(line);
    if (line.kind === 'entry') {
      // Later duplicates win, as in most INI readers.
      this.entries.set(line.key, line);
    }
  }

  /** Body lines, without the header. */
  render(): string[] {
    return this.lines.map((line) => (line.kind === 'entry' ? `${line.key}=${line.value}` : line.text));
  }
}

// ---------------------------------------------------------------------------
// IniDocument
// ---------------------------------------------------------------------------

/**
 * An INI file as an ordered list of sections.
 *
 * Sections keep file order and header text exactly, dots and digits included.
 * A repeated header continues the first section of that name. Lines before the
 * first header are kept and written back first.
 */
export class IniDocument {
  private readonly preamble = new IniSection('');
  private readonly sectionMap = new Map<string, IniSection>();

  static parse(text: string): IniDocument {
    const doc = new IniDocument();
    let current = doc.preamble;

    for (const raw of text.split(/\r?\n/)) {
      const line = raw.trim();
      if (line.length === 0) {
        continue;
      }
      if (isComment(line)) {
        current.appendLine({ kind: 'text', text: line });
        continue;
      }

      const header = SECTION_HEADER.exec(line);
      if (header) {
        current = doc.addSection(header[1].trim());
        continue;
      }

      const eq = line.indexOf('=');
      const key = eq < 0 ? '' : line.slice(0, eq).trim();
      if (key.length === 0) {
        current.appendLine({ kind: 'text', text: line });
      } else {
        current.appendLine({ kind: 'entry', key, value: line.slice(eq + 1).trim() });
      }
    }

    return doc;
  }

  sectionNames(): string[] {
    return Array.from(this.sectionMap.keys());
  }

  sections(): IniSection[] {
    return Array.from(this.sectionMap.values());
  }

  hasSection(name: string): boolean {
    return this.sectionMap.has(name);
  }

  getSection(name: string): IniSection | undefined {
    return this.sectionMap.get(name);
  }

  /** Return the named section, appending an empty one if it does not exist. */
  addSection(name: string): IniSection {
    const existing = this.sectionMap.get(name);
    if (existing) {
      return existing;
    }
    const section = new IniSection(name);
    this.sectionMap.set(name, section);
    return section;
  }

  removeSection(name: string): boolean {
    return this.sectionMap.delete(name);
  }

  /** Serialize, one blank line between blocks, `key=value` without padding. */
  toString(): string {
    const blocks: string[][] = [];
    if (!this.preamble.isEmpty()) {
      blocks.push(this.preamble.render());
    }
    for (const section of this.sectionMap.values()) {
      blocks.push([`[${section.name}]`, ...section.render()]);
    }
    return blocks.map((block) => block.map((line) => line + EOL).join('')).join(EOL);
  }
}
