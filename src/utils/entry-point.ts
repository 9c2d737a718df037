import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';

/**
 * Whether the module at `moduleUrl` is the script node was started with.
 * npm installs bins as symlinks, so the script path is resolved first.
 */
export function isEntryPoint(moduleUrl: string, script: string | undefined = process.argv[1]): boolean {
  if (script === undefined) {
    return false;
  }

  try {
    return moduleUrl === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}
