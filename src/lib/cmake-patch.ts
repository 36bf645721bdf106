import * as fs from 'fs';

export interface PatchResult {
  content: string;
  /** Lines prefixed, summed over all patterns */
  changed: number;
}

/**
 * Prefix every line containing one of `patterns` with `marker`, one pattern
 * at a time, the way `sed '/pattern/s/^/# /'` would. Already-commented lines
 * still contain the pattern and gain another marker.
 */
export function commentOutMatchingLines(
  content: string,
  patterns: readonly string[],
  marker: string
): PatchResult {
  let lines = content.split('\n');
  let changed = 0;

  for (const pattern of patterns) {
    lines = lines.map(line => {
      if (!line.includes(pattern)) {
        return line;
      }
      changed++;
      return `${marker}${line}`;
    });
  }

  return { content: lines.join('\n'), changed };
}

export function patchFile(
  filePath: string,
  patterns: readonly string[],
  marker: string
): number {
  const original = fs.readFileSync(filePath, 'utf-8');
  const { content, changed } = commentOutMatchingLines(original, patterns, marker);

  if (changed > 0) {
    fs.writeFileSync(filePath, content);
  }
  return changed;
}
