import * as os from 'node:os';
import * as path from 'node:path';

const APP_DIR = 'reposcore';

export function getConfigRoot(env: NodeJS.ProcessEnv = process.env): string {
  const platform = os.platform();

  if (env['XDG_CONFIG_HOME']) {
    return path.join(env['XDG_CONFIG_HOME'], APP_DIR);
  }

  switch (platform) {
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', APP_DIR);
    case 'win32':
      return path.join(env['APPDATA'] ?? os.homedir(), APP_DIR);
    default:
      return path.join(os.homedir(), '.config', APP_DIR);
  }
}
