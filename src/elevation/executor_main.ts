#!/usr/bin/env node
/**
 * elevation/executor_main.ts
 *
 * Process entry for the elevated helper. Started by PowerShellRunAsLauncher
 * with `-Verb RunAs`; never started directly by the service.
 */

import { initLogger, scopedLogger } from '../core/logger';
import { DEFAULT_CONFIG } from '../core/config';
import { errorMessage } from '../core/errors';

initLogger({ logLevel: 'warn' });
const log = scopedLogger('elevation/executor_main');

async function main(): Promise<number> {
  const { PowerShellRegistryStore } = await import('../store/powershell_store');
  const { runElevatedExecutor } = await import('./elevated_executor');

  // Each write carries its own PowerShell timeout, so the helper always
  // exits after at most operations × powershellTimeoutMs.
  return runElevatedExecutor(process.argv.slice(2), new PowerShellRegistryStore(DEFAULT_CONFIG.powershellTimeoutMs));
}

main()
  .then(code => process.exit(code))
  .catch((e: unknown) => {
    log.fatal({ error: errorMessage(e), stack: e instanceof Error ? e.stack : undefined }, 'Elevated helper crashed');
    process.exit(1);
  });
