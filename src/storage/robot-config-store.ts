import path from 'node:path';
import Debug from 'debug';

import { resolveSdkConfigPath } from '../config.js';
import { ConfigurationValidationError } from '../errors.js';
import type { RobotConfiguration } from '../models/robot-configuration.js';
import { type FileSystem, NodeFileSystem, wrapIO } from './file-system.js';
import { IniDocument } from './ini-document.js';
import { decodeSection, encodeSection } from './section-codec.js';

const debug = Debug('vector-sdk-config:store');

export interface RobotConfigStoreOptions {
  /** Defaults to {@link NodeFileSystem}. */
  fileSystem?: FileSystem;
  /** Environment consulted when no file path is given. */
  env?: NodeJS.ProcessEnv;
  /** Profile directory lookup used when no file path is given. */
  homeDir?: () => string;
  /**
   * Rewrite existing certificate files whose content differs from the entry
   * being saved. Off by default: certificate files are written once.
   */
  overwriteCertificates?: boolean;
}

/**
 * Robot configurations persisted in one INI file, one section per serial
 * number, with each certificate in its own file beside it.
 *
 * The store keeps no state between calls. Every operation reads and/or
 * rewrites the whole file within the call; there is no locking, so concurrent
 * writers from different processes race and the last write wins.
 *
 * ```
 * [00e20142]
 * guid=...
 * name=Vector-E5S6
 * cert=/home/me/.anki_vector/Vector-E5S6-00e20142.cert
 * ip=192.168.1.20
 * ```
 */
export class RobotConfigStore {
  readonly filePath: string;
  private readonly fileSystem: FileSystem;
  private readonly overwriteCertificates: boolean;

  constructor(filePath?: string, options: RobotConfigStoreOptions = {}) {
    this.filePath =
      filePath ?? resolveSdkConfigPath({ env: options.env, homeDir: options.homeDir });
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.overwriteCertificates = options.overwriteCertificates ?? false;
  }

  /** Directory holding the configuration file and new certificate files. */
  get directory(): string {
    return path.dirname(this.filePath);
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  /**
   * Every stored robot, in file order.
   *
   * Lazy: nothing is read until iteration starts, and each iteration re-reads
   * the file. A missing file yields nothing.
   *
   * @throws ConfigurationLoadError (during iteration) for the first section
   *   that cannot be decoded; no further entries are produced.
   * @throws ConfigurationIOError (during iteration) if the file cannot be read.
   */
  loadAll(): Iterable<RobotConfiguration> {
    return {
      [Symbol.iterator]: () => this.readEntries(),
    };
  }

  /** The first stored robot, or `undefined` when there is none. */
  loadDefault(): RobotConfiguration | undefined {
    for (const entry of this.loadAll()) {
      return entry;
    }
    return undefined;
  }

  // -----------------------------------------------------------------------
  // Writes
  // -----------------------------------------------------------------------

  /** Add one robot, or update it in place if its serial number exists. */
  addOrUpdate(entry: RobotConfiguration): void {
    this.write([entry], false);
  }

  /** Add or update several robots. Sections not mentioned are untouched. */
  merge(entries: Iterable<RobotConfiguration>): void {
    this.write(entries, false);
  }

  /**
   * Make the file hold exactly `entries`: each is added or updated, and every
   * other section is removed. `save([])` empties the store.
   *
   * Certificate files of removed robots are left on disk.
   */
  save(entries: Iterable<RobotConfiguration>): void {
    this.write(entries, true);
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private *readEntries(): Generator<RobotConfiguration, void, undefined> {
    const doc = this.readDocument();
    if (doc === null) {
      debug('no configuration at %s', this.filePath);
      return;
    }

    const context = {
      fileSystem: this.fileSystem,
      filePath: this.filePath,
      baseDirectory: this.directory,
    };
    for (const section of doc.sections()) {
      yield decodeSection(section, context);
    }
  }

  private readDocument(): IniDocument | null {
    const exists = wrapIO('check', this.filePath, () => this.fileSystem.exists(this.filePath));
    if (!exists) {
      return null;
    }
    const text = wrapIO('read', this.filePath, () => this.fileSystem.readText(this.filePath));
    return IniDocument.parse(text);
  }

  /**
   * Validate the whole batch, then apply it to the current document and write
   * the file once. Nothing touches the disk if any entry is invalid.
   */
  private write(entries: Iterable<RobotConfiguration>, replaceAll: boolean): void {
    const batch = Array.from(entries);
    const issues = batch.flatMap((entry) => entry.validationIssues());
    if (issues.length > 0) {
      throw new ConfigurationValidationError(issues);
    }

    const directory = this.directory;
    wrapIO('create directory', directory, () => this.fileSystem.ensureDirectory(directory));

    const doc = this.readDocument() ?? new IniDocument();
    const context = {
      fileSystem: this.fileSystem,
      baseDirectory: directory,
      overwriteCertificate: this.overwriteCertificates,
    };

    const serialNumbers = new Set<string>();
    for (const entry of batch) {
      const isNew = !doc.hasSection(entry.serialNumber);
      encodeSection(entry, doc.addSection(entry.serialNumber), context);
      serialNumbers.add(entry.serialNumber);
      debug('%s [%s]', isNew ? 'added' : 'updated', entry.serialNumber);
    }

    if (replaceAll) {
      for (const name of doc.sectionNames()) {
        if (!serialNumbers.has(name)) {
          doc.removeSection(name);
          debug('removed [%s]', name);
        }
      }
    }

    wrapIO('write', this.filePath, () => this.fileSystem.writeText(this.filePath, doc.toString()));
    debug('wrote %d section(s) to %s', doc.sectionNames().length, this.filePath);
  }
}
