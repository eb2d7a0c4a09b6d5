import path from 'path';
import { UsageError } from '../utils/errors';

/**
 * Writes each command word as `short[[rest]]`, the form the template index
 * uses to accept every abbreviation down to `short`.
 */
export function abbreviateCommand(command: string, short: string): string {
	const words = command.split(/\s+/).filter(Boolean);
	const shortWords = short.split(/\s+/).filter(Boolean);
	if (shortWords.length > words.length) {
		throw new UsageError(`"${short}" has more words than "${command}"`);
	}

	return shortWords
		.map((shortWord, index) => {
			const rest = words[index].split(shortWord).join('');
			return rest === '' ? shortWord : `${shortWord}[[${rest}]]`;
		})
		.join(' ');
}

export function formatIndexEntry(templateFile: string, vendor: string, command: string, short: string): string {
	return `${path.basename(templateFile)}, .*, ${vendor}, ${abbreviateCommand(command, short)}`;
}
