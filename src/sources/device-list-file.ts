import fs from 'fs/promises';

const HEADER_NAMES = new Set([
  'devicename',
  'device name',
  'name',
  'displayname',
  'serialnumber',
  'serial number',
  'serial',
  'id',
  'deviceid',
  'managementid',
  'manageddeviceid',
  'azureaddeviceid',
  'objectid',
  'directoryobjectid',
]);

function firstColumn(line: string): string {
  const trimmed = line.trim();
  if (trimmed.startsWith('"')) {
    const closing = trimmed.indexOf('"', 1);
    return closing > 0 ? trimmed.slice(1, closing) : trimmed.slice(1);
  }
  const comma = trimmed.indexOf(',');
  return (comma >= 0 ? trimmed.slice(0, comma) : trimmed).replace(/"/g, '').trim();
}

/**
 * Identifiers from a device list: one per line, or the first column of a CSV.
 * Blank lines, `#` comments and a recognised header row are skipped;
 * duplicates (case-insensitive) keep their first position.
 */
export function parseDeviceListFile(text: string): string[] {
  const seen = new Set<string>();
  const identifiers: string[] = [];
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  let sawContent = false;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith('#')) continue;

    const value = firstColumn(trimmed).trim();
    const isFirst = !sawContent;
    sawContent = true;
    if (value.length === 0) continue;
    if (isFirst && HEADER_NAMES.has(value.toLowerCase())) continue;

    const dedupeKey = value.toLowerCase();
    if (seen.has(dedupeKey)) continue;
    seen.add(dedupeKey);
    identifiers.push(value);
  }

  return identifiers;
}

export async function readDeviceListFile(filePath: string): Promise<string[]> {
  return parseDeviceListFile(await fs.readFile(filePath, 'utf8'));
}
