import path from 'path';

/**
 * Turn the `database` connection string into a sqlite3 filename.
 * Accepts a bare path, `:memory:`, `sqlite:<path>`, `sqlite://<path>` and
 * `file:<path>`; relative paths resolve against `workdir`.
 */
export function resolveDatabasePath(database: string, workdir: string = '.'): string {
  const trimmed = database.trim();
  if (trimmed === ':memory:') return trimmed;

  const scheme = /^([a-z][a-z0-9+.-]*):(?!\\)/i.exec(trimmed);
  let target = trimmed;
  if (scheme && scheme[1].length > 1) {
    const name = scheme[1].toLowerCase();
    if (name !== 'sqlite' && name !== 'sqlite3' && name !== 'file') {
      throw new Error(`Unsupported database scheme "${name}:" (expected a sqlite path)`);
    }
    target = trimmed.slice(scheme[0].length).replace(/^\/\//, '');
  }

  if (target === ':memory:') return target;
  if (!target) throw new Error('Database connection string has no path');
  return path.isAbsolute(target) ? target : path.resolve(workdir, target);
}
