/**
 * Display helpers shared by the renderers.
 */
import { SHORT_ID_LENGTH } from './types.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Format a byte count with decimal (1000-based) units and one fractional digit.
 * Values beyond the TB range stay in TB.
 */
export function humanSize(bytes: number): string {
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1000 && unitIndex < SIZE_UNITS.length - 1) {
    value /= 1000;
    unitIndex++;
  }

  return `${roundToTenths(value)} ${SIZE_UNITS[unitIndex]}`;
}

/**
 * One fractional digit, ties to even. toFixed breaks exact ties upward; the
 * only exact ties a double can hold at one decimal end in .25 or .75.
 */
function roundToTenths(value: number): string {
  const quarters = value * 4;
  const isTie = Number.isInteger(quarters) && quarters % 2 === 1;
  const tenths = Math.floor(value * 10);
  if (isTie && tenths % 2 === 0) {
    return (tenths / 10).toFixed(1);
  }
  return value.toFixed(1);
}

/**
 * First 12 characters of an image id.
 */
export function shortenId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

/**
 * Split `repository:tag` at the last colon, so registry ports stay in the repository.
 */
export function splitRepoTag(repoTag: string): { repository: string; tag: string } {
  const lastColon = repoTag.lastIndexOf(':');
  if (lastColon === -1) {
    return { repository: repoTag, tag: '' };
  }
  return {
    repository: repoTag.slice(0, lastColon),
    tag: repoTag.slice(lastColon + 1),
  };
}
