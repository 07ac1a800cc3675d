/**
 * Date formatting utilities for S3 Signature V4
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format date as YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}`;
}

/**
 * Format date as YYYYMMDDTHHmmssZ (ISO 8601 basic format)
 */
export function formatAmzDate(date: Date): string {
  return (
    formatDateStamp(date) +
    `T${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}Z`
  );
}
