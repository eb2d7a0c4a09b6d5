/**
 * Base class for every failure raised by the development tooling
 */
export class TemplateDevError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Invalid command-line input (missing vendor/command, bad index, ...)
 */
export class UsageError extends TemplateDevError {}

/**
 * A `.textfsm` source that cannot be turned into a runnable template
 */
export class TemplateSyntaxError extends TemplateDevError {
	constructor(
		message: string,
		readonly lineNumber?: number,
	) {
		super(lineNumber === undefined ? message : `${message} Line: ${lineNumber}.`);
	}
}

/**
 * Raised while a template runs, e.g. by an `Error` rule action
 */
export class TemplateRuntimeError extends TemplateDevError {}

/**
 * The value handed to the comment walker carries no comment metadata at all
 */
export class CommentsUnavailableError extends TemplateDevError {}

/**
 * A comment slot that is neither a single comment nor a group
 */
export class MalformedCommentError extends TemplateDevError {}

/**
 * A record value that is not a string, a number or a list of those
 */
export class RecordShapeError extends TemplateDevError {}

export class MissingSampleError extends TemplateDevError {}

export class YamlLoadError extends TemplateDevError {}
