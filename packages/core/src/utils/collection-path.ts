/**
 * Collection paths
 *
 * A path is a '/'-joined sequence of collection labels. Labels containing
 * '/', '.' or '"' are wrapped in double quotes, inner quotes doubled.
 */

const NEEDS_QUOTING = /[/."]/;

export function escapeLabel(label: string): string {
  if (!NEEDS_QUOTING.test(label)) {
    return label;
  }
  return `"${label.replace(/"/g, '""')}"`;
}

export function joinCollectionPath(labels: readonly string[]): string {
  return labels.map(escapeLabel).join('/');
}

export function splitCollectionPath(path: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < path.length; i++) {
    const ch = path.charAt(i);

    if (ch === '"') {
      if (inQuotes && path.charAt(i + 1) === '"') {
        current += '"';
        i++;
        continue;
      }
      inQuotes = !inQuotes;
      continue;
    }

    if (ch === '/' && !inQuotes) {
      if (current) parts.push(current);
      current = '';
      continue;
    }

    current += ch;
  }

  if (current) {
    parts.push(current);
  }

  return parts;
}

/** Path of a child collection below parentPath ('' is the scope root) */
export function appendToCollectionPath(parentPath: string, label: string): string {
  return parentPath ? `${parentPath}/${escapeLabel(label)}` : escapeLabel(label);
}

/** Number of labels in a path */
export function collectionPathDepth(path: string | undefined): number {
  return path ? splitCollectionPath(path).length : 0;
}

/** Re-join a path in canonical escaping so equal paths compare equal */
export function canonicalCollectionPath(path: string | undefined): string {
  return path ? joinCollectionPath(splitCollectionPath(path)) : '';
}
