import * as core from '@actions/core';
import * as glob from '@actions/glob';

/**
 * Split a multi-line action input into trimmed, non-empty entries
 */
export function parseMultilineInput(input: string): string[] {
  return input
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

/**
 * Resolve glob patterns to record files, de-duplicated and in match order
 */
export async function resolveGlobPaths(patterns: string[]): Promise<string[]> {
  core.debug(`Resolving ${patterns.length} glob patterns`);

  const resolvedPaths: string[] = [];

  for (const pattern of patterns) {
    try {
      core.debug(`  Processing pattern: ${pattern}`);

      const globber = await glob.create(pattern, {
        followSymbolicLinks: false,
        matchDirectories: false,
      });
      const files = await globber.glob();

      if (files.length > 0) {
        core.debug(`    Matched ${files.length} files`);
        resolvedPaths.push(...files);
      } else {
        core.debug(`    No files matched this pattern`);
      }
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      core.warning(`Failed to resolve pattern "${pattern}": ${errorMsg}`);

      if (errorMsg.includes('Permission denied') || errorMsg.includes('EACCES')) {
        core.warning('  - Check file/directory permissions');
      } else if (errorMsg.includes('ENOENT')) {
        core.warning('  - Path does not exist');
      }
    }
  }

  const uniquePaths = [...new Set(resolvedPaths)];
  core.debug(`  Total unique paths resolved: ${uniquePaths.length}`);

  return uniquePaths;
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB'];

/**
 * Render a payload size for log lines, e.g. `1.5 KB`
 */
export function formatBytes(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  return unit === 0 ? `${size} B` : `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}
