import { exec } from 'child_process';
import { promisify } from 'util';
import checkDiskSpace from 'check-disk-space';
import type { DiskSpace, DiskUsageRow } from '../types.js';

export class DiskUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiskUsageError';
  }
}

const execAsync = promisify(exec);

/**
 * Parses `df -h` output into rows.
 *
 * Linux prints six columns and macOS nine (inode counts sit before the
 * mount point), so the mount column is located from the header.
 */
export function parseDiskUsage(output: string): DiskUsageRow[] {
  const lines = output.trim().split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    throw new DiskUsageError('no disk usage data');
  }

  const header = lines[0].trim().split(/\s+/);
  const mountIndex = header.indexOf('Mounted');
  if (header[0] !== 'Filesystem' || mountIndex < 5) {
    throw new DiskUsageError(`unrecognised df header: ${lines[0].trim()}`);
  }

  const rows: DiskUsageRow[] = [];
  for (const line of lines.slice(1)) {
    const fields = line.trim().split(/\s+/);
    if (fields.length <= mountIndex) {
      continue; // Malformed or wrapped line
    }
    rows.push({
      filesystem: fields[0],
      size: fields[1],
      used: fields[2],
      avail: fields[3],
      capacity: fields[4],
      mountedOn: fields.slice(mountIndex).join(' '),
    });
  }

  if (rows.length === 0) {
    throw new DiskUsageError('no disk usage data');
  }
  return rows;
}

export async function getDiskUsageReport(): Promise<DiskUsageRow[]> {
  const { stdout } = await execAsync('df -h');
  return parseDiskUsage(stdout);
}

export async function getDiskSpace(path: string): Promise<DiskSpace> {
  const space = await checkDiskSpace(path);
  return { diskPath: space.diskPath, free: space.free, size: space.size };
}
