/**
 * Quota properties for PROPFIND multistatus bodies.
 *
 * Adds `quota-available-bytes` and `quota-used-bytes` to the first `prop`
 * element of a multistatus document. The body is treated as bytes and
 * spliced, not parsed, so everything around the insertion point is left
 * exactly as the engine wrote it.
 */

import type { UsageStats } from '@davgate/shared';

export const DEFAULT_DAV_PREFIX = 'D';

const DAV_PREFIX_PATTERN = /xmlns:([A-Za-z0-9_]+)=["']DAV:["']/;

/** First closing tag whose local name ends in `prop`: `</D:prop>`, `</prop>`, `</lp1:prop>`. */
const CLOSING_PROP_PATTERN = /<\/[A-Za-z0-9_:]*prop>/;

/**
 * Namespace prefix the document binds to `DAV:`, or `D` when it binds none.
 */
export function detectDavPrefix(xml: string): string {
  const match = DAV_PREFIX_PATTERN.exec(xml);
  return match ? match[1] : DEFAULT_DAV_PREFIX;
}

export function buildQuotaProperties(prefix: string, usage: UsageStats): string {
  return (
    `<${prefix}:quota-available-bytes>${usage.freeBytes}</${prefix}:quota-available-bytes>` +
    `<${prefix}:quota-used-bytes>${usage.usedBytes}</${prefix}:quota-used-bytes>`
  );
}

/**
 * Returns a new body with the quota properties spliced in before the first
 * closing `prop` tag, or the original buffer when there is none.
 */
export function injectQuotaProperties(body: Buffer, usage: UsageStats): Buffer {
  // latin1 maps each byte to one char, so string offsets are byte offsets.
  const text = body.toString('latin1');

  const match = CLOSING_PROP_PATTERN.exec(text);
  if (!match) return body;

  const insertion = Buffer.from(buildQuotaProperties(detectDavPrefix(text), usage), 'utf8');
  return Buffer.concat([body.subarray(0, match.index), insertion, body.subarray(match.index)]);
}
