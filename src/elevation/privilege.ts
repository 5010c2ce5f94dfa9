/**
 * elevation/privilege.ts
 *
 * Does the current process hold enough privilege to write under HKLM?
 */

import { execFile } from 'child_process';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('elevation/privilege');

export interface PrivilegeProbe {
  isElevated(): Promise<boolean>;
}

/**
 * `net session` succeeds only for an administrator token.
 * On non-Windows (dev machines) the check is skipped and counts as elevated.
 */
export class NetSessionProbe implements PrivilegeProbe {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  isElevated(): Promise<boolean> {
    if (this.platform !== 'win32') {
      log.debug({ platform: this.platform }, 'Non-Windows platform, elevation check skipped');
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      execFile('net', ['session'], { windowsHide: true, timeout: 10000 }, error => {
        const elevated = error === null;
        log.debug({ elevated }, 'Privilege probed');
        resolve(elevated);
      });
    });
  }
}
