import * as fs from 'fs';
import * as os from 'os';
import { logger } from './utils/logger';

export const POSSIBLE_CPUS_PATH = '/sys/devices/system/cpu/possible';

/**
 * Counts the CPUs in a kernel cpu list such as "0-3,8-11" or "0,2,4".
 * Returns undefined for anything that is not a valid list.
 */
export function parseCpuList(list: string): number | undefined {
  const trimmed = list.trim();
  if (!trimmed) return undefined;

  let count = 0;
  for (const part of trimmed.split(',')) {
    const match = /^(\d+)(?:-(\d+))?$/.exec(part.trim());
    if (!match) return undefined;
    const start = parseInt(match[1], 10);
    const end = match[2] === undefined ? start : parseInt(match[2], 10);
    if (end < start) return undefined;
    count += end - start + 1;
  }
  return count;
}

/**
 * Number of possible CPUs, i.e. how many values a per-CPU map lookup returns.
 */
export function possibleCpuCount(path = POSSIBLE_CPUS_PATH): number {
  try {
    const count = parseCpuList(fs.readFileSync(path, 'utf8'));
    if (count !== undefined) return count;
    logger.warn(`Unparsable cpu list in ${path}, falling back to online CPUs`);
  } catch (err) {
    logger.warn(`Cannot read ${path}, falling back to online CPUs`, err);
  }
  return os.cpus().length;
}
