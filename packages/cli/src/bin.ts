#!/usr/bin/env node

import { toErrorMessage } from '@runwright/shared';
import { EXIT_RUNTIME_ERROR } from './constants.js';
import { isExecutedAsScript, runCliEntrypoint } from './entrypoint.js';

export { isExecutedAsScript, main, runCliEntrypoint } from './entrypoint.js';
export type { CliDependencies, CliIo, ExitCode, MainOptions } from './types.js';

if (isExecutedAsScript(process.argv[1], import.meta.url)) {
  runCliEntrypoint().catch((error: unknown) => {
    console.error(`Fatal error: ${toErrorMessage(error)}`);
    process.exit(EXIT_RUNTIME_ERROR);
  });
}
