import path from 'node:path';
import Debug from 'debug';

import { ConfigurationLoadError, errorMessage } from '../errors.js';
import { normalizeIpAddress } from '../models/ip-address.js';
import {
  RobotConfiguration,
  type RemoteRobotConfiguration,
} from '../models/robot-configuration.js';
import { type FileSystem, wrapIO } from './file-system.js';
import type { IniSection } from './ini-document.js';

const debug = Debug('vector-sdk-config:codec');

/** Keys this library reads and writes inside a robot section. */
export const SectionKey = {
  guid: 'guid',
  name: 'name',
  ip: 'ip',
  cert: 'cert',
  remote: 'remote',
} as const;

export interface DecodeContext {
  fileSystem: FileSystem;
  /** Configuration file being read; used in errors. */
  filePath: string;
  /** Directory relative `cert` paths are resolved against. */
  baseDirectory: string;
}

export interface EncodeContext {
  fileSystem: FileSystem;
  /** Directory new certificate files are created in. */
  baseDirectory: string;
  /** Rewrite an existing certificate file whose content differs. */
  overwriteCertificate: boolean;
}

/** Default certificate file name for a robot: `<RobotName>-<serial>.cert`. */
export function certificateFileName(robotName: string, serialNumber: string): string {
  return `${robotName}-${serialNumber}.cert`;
}

function requireValue(section: IniSection, key: string): string | undefined {
  const value = section.getString(key);
  return value === undefined || value.trim().length === 0 ? undefined : value;
}

// ---------------------------------------------------------------------------
// Decode
// ---------------------------------------------------------------------------

/**
 * Build a robot configuration from its section. The section name is the
 * serial number; `cert` is a path whose file content becomes `certificate`.
 *
 * @throws ConfigurationLoadError if a required key is missing, `ip` is not an
 *   address, or the certificate file cannot be read.
 */
export function decodeSection(section: IniSection, context: DecodeContext): RobotConfiguration {
  const serialNumber = section.name;
  const fail = (reason: string, cause?: unknown): ConfigurationLoadError =>
    new ConfigurationLoadError(
      `Invalid robot configuration [${serialNumber}] in ${context.filePath}: ${reason}`,
      { filePath: context.filePath, serialNumber },
      cause === undefined ? undefined : { cause },
    );

  const guid = requireValue(section, SectionKey.guid);
  if (guid === undefined) throw fail(`missing "${SectionKey.guid}"`);

  const robotName = requireValue(section, SectionKey.name);
  if (robotName === undefined) throw fail(`missing "${SectionKey.name}"`);

  const certPath = requireValue(section, SectionKey.cert);
  if (certPath === undefined) throw fail(`missing "${SectionKey.cert}"`);

  let ipAddress: string | undefined;
  if (section.has(SectionKey.ip)) {
    const raw = section.getString(SectionKey.ip) ?? '';
    const normalized = normalizeIpAddress(raw);
    if (normalized === null) throw fail(`"${SectionKey.ip}" is not an IP address: ${JSON.stringify(raw)}`);
    ipAddress = normalized;
  }

  const resolvedCertPath = path.resolve(context.baseDirectory, certPath);
  let certificate: string;
  try {
    certificate = context.fileSystem.readText(resolvedCertPath);
  } catch (err) {
    throw fail(`cannot read certificate ${resolvedCertPath}: ${errorMessage(err)}`, err);
  }

  return new RobotConfiguration({
    serialNumber,
    robotName,
    guid,
    certificate,
    ipAddress,
    remoteHost: section.has(SectionKey.remote) ? section.getString(SectionKey.remote) : undefined,
  });
}

// ---------------------------------------------------------------------------
// Encode
// ---------------------------------------------------------------------------

/**
 * Write a robot configuration into its section.
 *
 * An existing `cert` path is never changed. When the section has none, the
 * path becomes `<baseDirectory>/<RobotName>-<serial>.cert`. `ip` is written
 * only when the entry has an address and is otherwise left as it is; a blank
 * `remote` is removed rather than written empty.
 *
 * Certificate files are write-once: the in-memory certificate is written only
 * if nothing exists at the path yet, unless `overwriteCertificate` is set.
 */
export function encodeSection(
  entry: RemoteRobotConfiguration,
  section: IniSection,
  context: EncodeContext,
): void {
  section.set(SectionKey.guid, entry.guid);
  section.set(SectionKey.name, entry.robotName);

  let certPath = requireValue(section, SectionKey.cert);
  if (certPath === undefined) {
    certPath = path.join(
      context.baseDirectory,
      certificateFileName(entry.robotName, entry.serialNumber),
    );
    section.set(SectionKey.cert, certPath);
  }

  // A stored LAN address outlives entries built without one.
  if (entry.ipAddress !== undefined) {
    section.set(SectionKey.ip, entry.ipAddress);
  }

  if (entry.hasRemoteHost && entry.remoteHost !== undefined) {
    section.set(SectionKey.remote, entry.remoteHost);
  } else {
    section.delete(SectionKey.remote);
  }

  materializeCertificate(entry, path.resolve(context.baseDirectory, certPath), context);
}

function materializeCertificate(
  entry: RemoteRobotConfiguration,
  certPath: string,
  context: EncodeContext,
): void {
  const { fileSystem } = context;

  if (!wrapIO('check', certPath, () => fileSystem.exists(certPath))) {
    wrapIO('write certificate', certPath, () => fileSystem.writeText(certPath, entry.certificate));
    debug('wrote certificate for [%s] to %s', entry.serialNumber, certPath);
    return;
  }

  if (!context.overwriteCertificate) {
    return;
  }

  const current = wrapIO('read certificate', certPath, () => fileSystem.readText(certPath));
  if (current !== entry.certificate) {
    wrapIO('write certificate', certPath, () => fileSystem.writeText(certPath, entry.certificate));
    debug('replaced certificate for [%s] at %s', entry.serialNumber, certPath);
  }
}
