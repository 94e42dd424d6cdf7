/**
 * Diff Attributor - cuts one file's section out of a multi-file patch.
 *
 * Sections are matched on the target's base file name appearing in the
 * `diff --git` header, not on the full path. Two files sharing a base name in
 * different directories therefore both land in each other's fragment.
 */

const FILE_HEADER = 'diff --git ';

export function fragmentFor(diffText: string, targetPath: string): string {
  const fileName = baseName(targetPath);
  if (!fileName) return '';

  const kept: string[] = [];
  let inSection = false;

  for (const line of diffText.split(/\r?\n/)) {
    if (line.startsWith(FILE_HEADER)) {
      inSection = line.includes(fileName);
      if (inSection) kept.push(line);
      continue;
    }
    if (inSection) kept.push(line);
  }

  // A trailing newline in the patch leaves one empty element behind
  while (kept.length > 0 && kept[kept.length - 1] === '') kept.pop();

  return kept.join('\n');
}

function baseName(path: string): string {
  const normalized = path.replace(/\\/g, '/');
  const idx = normalized.lastIndexOf('/');
  return idx >= 0 ? normalized.slice(idx + 1) : normalized;
}
