import type { OscTimeTag } from '../types/osc.js';

/** Seconds between the NTP epoch (1900) and the Unix epoch (1970). */
const NTP_UNIX_OFFSET = 2_208_988_800;
const TWO_POW_32 = 0x1_0000_0000;

/** The "process immediately" sentinel, 0x0000000000000001. */
export const IMMEDIATE: Readonly<OscTimeTag> = Object.freeze({ seconds: 0, fraction: 1 });

export function isImmediate(tag: OscTimeTag): boolean {
  return tag.seconds === 0 && tag.fraction === 1;
}

export function timeTagFromDate(date: Date | number): OscTimeTag {
  const ms = typeof date === 'number' ? date : date.getTime();
  const unixSeconds = Math.floor(ms / 1000);
  const remainderMs = ms - unixSeconds * 1000;
  return {
    seconds: unixSeconds + NTP_UNIX_OFFSET,
    fraction: Math.floor((remainderMs / 1000) * TWO_POW_32),
  };
}

export function dateFromTimeTag(tag: OscTimeTag): Date {
  const ms = (tag.seconds - NTP_UNIX_OFFSET) * 1000 + (tag.fraction / TWO_POW_32) * 1000;
  return new Date(ms);
}

export function isUint32(n: number): boolean {
  return Number.isInteger(n) && n >= 0 && n < TWO_POW_32;
}
