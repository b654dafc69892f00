#!/usr/bin/env node

/**
 * Resolve deployment environments from the command line
 *
 * @example
 * ```bash
 * show-config environments.json --defaults defaults.json --env production
 * show-config environments.json --json > resolved.json
 * ```
 */

import { runShowConfig } from './summary';

if (require.main === module) {
  runShowConfig(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
