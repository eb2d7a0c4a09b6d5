import chalk from 'chalk';

const PREFIX = '[template-dev]';

/**
 * Utility class for logging development-script operations
 */
export class LoggingUtils {
	/**
	 * Log a message if verbose logging is enabled
	 */
	static log(message: string, verboseLogging: boolean): void {
		if (verboseLogging) {
			console.log(`${chalk.gray(PREFIX)} ${message}`);
		}
	}

	/**
	 * Always shown: results the user asked for
	 */
	static info(message: string): void {
		console.log(`${chalk.cyan(PREFIX)} ${message}`);
	}

	static error(message: string): void {
		console.error(`${chalk.red(PREFIX)} ${chalk.red(message)}`);
	}

	/**
	 * Log debug information, optionally with a structured payload
	 */
	static debug(message: string, data?: unknown, verboseLogging?: boolean): void {
		if (verboseLogging) {
			if (data !== undefined) {
				console.debug(`${chalk.gray(`${PREFIX} DEBUG`)} ${message}`, data);
			} else {
				console.debug(`${chalk.gray(`${PREFIX} DEBUG`)} ${message}`);
			}
		}
	}
}
