#!/usr/bin/env node
import { LoggingUtils } from '../utils/LoggingUtils';
import { runCli } from './DevelopmentCli';

runCli(process.argv).catch((error: unknown) => {
	LoggingUtils.error(error instanceof Error ? error.message : String(error));
	process.exitCode = 1;
});
