import { ConfigurationValidationError, type ValidationIssue } from '../errors.js';
import { normalizeIpAddress } from './ip-address.js';
import { ObservableObject } from './observable.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Read side of a robot configuration, as consumed by connection logic: the
 * address or remote host picks the transport, the certificate and GUID feed
 * the TLS/auth handshake.
 */
export interface RemoteRobotConfiguration {
  readonly serialNumber: string;
  readonly robotName: string;
  readonly guid: string;
  readonly certificate: string;
  readonly ipAddress: string | undefined;
  readonly remoteHost: string | undefined;
  readonly hasRemoteHost: boolean;
}

export interface RobotConfigurationInit {
  serialNumber?: string;
  robotName?: string;
  guid?: string;
  certificate?: string;
  ipAddress?: string;
  remoteHost?: string;
}

export interface RobotConfigurationJSON {
  serialNumber: string;
  robotName: string;
  guid: string;
  certificate: string;
  ipAddress?: string;
  remoteHost?: string;
}

interface ObservableFields {
  ipAddress: string | undefined;
  remoteHost: string | undefined;
}

/** Every property name a change listener can receive. */
export type RobotConfigurationProperty = keyof ObservableFields | 'hasRemoteHost';

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

/**
 * Serial numbers name both an INI section and part of the certificate file
 * name; robot names only the latter. Neither may contain path separators,
 * NUL, section brackets or line breaks, or be `.`/`..`.
 */
export function isSafeNameSegment(value: string): boolean {
  if (value === '.' || value === '..') {
    return false;
  }
  return !/[/\\\0[\]\r\n]/.test(value);
}

/** INI values and headers are read back trimmed, one per line. */
function survivesIniLine(value: string): boolean {
  return value === value.trim() && !/[\r\n]/.test(value);
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

// ---------------------------------------------------------------------------
// RobotConfiguration
// ---------------------------------------------------------------------------

/**
 * One robot's connection profile.
 *
 * Entries may be incomplete while being built; {@link validate} runs before
 * every write, not on assignment. `ipAddress` and `remoteHost` are observable
 * through {@link onPropertyChanged}; a `remoteHost` change also publishes
 * `hasRemoteHost`.
 */
export class RobotConfiguration
  extends ObservableObject<ObservableFields, 'hasRemoteHost'>
  implements RemoteRobotConfiguration
{
  /** Section key. Fixed for the lifetime of the entry. */
  readonly serialNumber: string;
  /** Human label, e.g. "Vector-E5S6". */
  robotName: string;
  guid: string;
  /** PEM certificate content (not a path). */
  certificate: string;

  constructor(init: RobotConfigurationInit = {}) {
    super({ ipAddress: undefined, remoteHost: undefined });
    this.serialNumber = init.serialNumber ?? '';
    this.robotName = init.robotName ?? '';
    this.guid = init.guid ?? '';
    this.certificate = init.certificate ?? '';
    this.ipAddress = init.ipAddress;
    this.remoteHost = init.remoteHost;
  }

  get ipAddress(): string | undefined {
    return this.getProperty('ipAddress');
  }

  /**
   * Last known address. Blank or `undefined` clears it.
   *
   * @throws ConfigurationValidationError if the value is not an IP literal.
   */
  set ipAddress(value: string | undefined) {
    let next: string | undefined;
    if (value !== undefined && !isBlank(value)) {
      const normalized = normalizeIpAddress(value);
      if (normalized === null) {
        throw new ConfigurationValidationError([
          {
            serialNumber: this.serialNumber || undefined,
            field: 'ipAddress',
            reason: `is not an IP address: ${JSON.stringify(value)}`,
          },
        ]);
      }
      next = normalized;
    }
    this.setProperty('ipAddress', next);
  }

  /** Explicit "host[:port]" used instead of the LAN address. */
  get remoteHost(): string | undefined {
    return this.getProperty('remoteHost');
  }

  /** Surrounding whitespace is dropped; a file cannot keep it. */
  set remoteHost(value: string | undefined) {
    if (this.setProperty('remoteHost', value?.trim())) {
      this.raisePropertyChanged('hasRemoteHost');
    }
  }

  get hasRemoteHost(): boolean {
    return !isBlank(this.remoteHost);
  }

  /** Every reason this entry cannot be persisted. Empty when it can. */
  validationIssues(): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    const serialNumber = isBlank(this.serialNumber) ? undefined : this.serialNumber;
    const required: Array<[string, string]> = [
      ['serialNumber', this.serialNumber],
      ['robotName', this.robotName],
      ['guid', this.guid],
      ['certificate', this.certificate],
    ];

    for (const [field, value] of required) {
      if (isBlank(value)) {
        issues.push({ serialNumber, field, reason: 'is required' });
      }
    }

    if (serialNumber !== undefined && !isSafeNameSegment(serialNumber)) {
      issues.push({ serialNumber, field: 'serialNumber', reason: 'is not a valid section name' });
    }
    if (!isBlank(this.robotName) && !isSafeNameSegment(this.robotName)) {
      issues.push({ serialNumber, field: 'robotName', reason: 'cannot be used in a file name' });
    }

    const stored: Array<[string, string | undefined]> = [
      ['serialNumber', serialNumber],
      ['robotName', this.robotName],
      ['guid', this.guid],
      ['remoteHost', this.remoteHost],
    ];
    for (const [field, value] of stored) {
      if (value !== undefined && !isBlank(value) && !survivesIniLine(value)) {
        issues.push({
          serialNumber,
          field,
          reason: 'cannot have surrounding whitespace or line breaks',
        });
      }
    }

    return issues;
  }

  /** @throws ConfigurationValidationError naming every offending field. */
  validate(): void {
    const issues = this.validationIssues();
    if (issues.length > 0) {
      throw new ConfigurationValidationError(issues);
    }
  }

  /** Plain snapshot. Unset optional fields are omitted. */
  toJSON(): RobotConfigurationJSON {
    const json: RobotConfigurationJSON = {
      serialNumber: this.serialNumber,
      robotName: this.robotName,
      guid: this.guid,
      certificate: this.certificate,
    };
    if (this.ipAddress !== undefined) {
      json.ipAddress = this.ipAddress;
    }
    if (this.remoteHost !== undefined) {
      json.remoteHost = this.remoteHost;
    }
    return json;
  }
}
