import { isIP } from 'node:net';

/**
 * Normalize an IPv4 or IPv6 literal.
 *
 * Surrounding whitespace and the brackets of a `[v6]` literal are removed and
 * the IPv6 address part is lower-cased (a `%zone` suffix is kept as written).
 * Returns `null` when the text is not an IP address; host names are not
 * accepted here, they belong in `remoteHost`.
 */
export function normalizeIpAddress(text: string): string | null {
  let value = text.trim();
  if (value.startsWith('[') && value.endsWith(']')) {
    value = value.slice(1, -1);
  }

  switch (isIP(value)) {
    case 4:
      return value;
    case 6: {
      const zoneIdx = value.indexOf('%');
      if (zoneIdx === -1) return value.toLowerCase();
      return value.slice(0, zoneIdx).toLowerCase() + value.slice(zoneIdx);
    }
    default:
      return null;
  }
}

