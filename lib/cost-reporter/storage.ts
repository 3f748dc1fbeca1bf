import fs from 'fs';
import path from 'path';
import { MalformedInputError } from './errors';

export const DAILY_TOTAL_FILE = 'ec2_cost_data_daily_total.json';
export const PER_INSTANCE_TYPE_FILE = 'ec2_cost_data_per_instance_type.json';

export const INVENTORY_FILE = 'ec2_inventory.json';

export const REPORT_FILE = 'ec2_cost_report.html';
export const IMAGES_DIR = 'images';
export const LINE_CHART_FILE = 'cost_over_time.png';
export const BAR_CHART_FILE = 'cost_per_instance_type.png';

export function readJsonFile(filePath: string): unknown {
  const contents = fs.readFileSync(filePath, 'utf-8');

  try {
    return JSON.parse(contents);
  } catch (error) {
    throw new MalformedInputError(`Invalid JSON in ${filePath}`, { cause: error });
  }
}

/**
 * Writes to a temporary sibling and renames it into place, so the destination
 * either holds the complete contents or is left untouched.
 */
export function writeFileAtomic(filePath: string, data: string | Uint8Array): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    fs.writeFileSync(tempPath, data);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }

  return filePath;
}

export function writeJsonFile(filePath: string, data: unknown, pretty: boolean = true): string {
  return writeFileAtomic(filePath, `${JSON.stringify(data, null, pretty ? 2 : undefined)}\n`);
}
