import { join } from 'node:path';
import { homedir } from 'node:os';
import { StorageType } from '../types/storage-type.js';

const APP_DIR = 'tasklet';

/** Platform data directory for the store */
export function getDataDir(): string {
  const platform = process.platform;

  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Application Support', APP_DIR);
  }
  if (platform === 'win32') {
    return join(process.env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), APP_DIR);
  }
  // Linux / other
  return join(process.env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), APP_DIR);
}

/** Returns the platform-appropriate default store path for a backend */
export function getDefaultStorePath(type: StorageType): string {
  return join(getDataDir(), type === StorageType.Sqlite ? 'tasks.db' : 'tasks.json');
}

/** Expand a leading `~` to the home directory */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/') || path.startsWith('~\\')) return join(homedir(), path.slice(2));
  return path;
}
